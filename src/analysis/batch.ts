import { logger } from "../core/logger.js";
import { asyncPool, withDeadline } from "../core/async.js";
import { EngineError, errorMessage, isEngineError, type EngineErrorCode } from "../core/errors.js";
import { assertEthAddress, parseChain } from "../core/validation.js";
import type { ChainId } from "../chains.js";
import type { ContractAnalyzer } from "./pipeline.js";
import type { ContractAnalysisResult } from "./types.js";

export const MAX_BATCH_SIZE = 10;

export type BatchItem = {
  address: string;
  /** Defaults to ethereum. */
  chain?: string;
};

export type BatchItemError = {
  address: string;
  chain: string;
  error: string;
  code?: EngineErrorCode;
};

export type BatchReport = {
  results: ContractAnalysisResult[];
  errors: BatchItemError[];
  total: number;
  success: number;
  failed: number;
};

type Outcome = { ok: true; result: ContractAnalysisResult } | { ok: false; error: BatchItemError };

export function assertBatchSize(count: number): void {
  if (count === 0) throw new EngineError("INVALID_INPUT", "no contracts provided");
  if (count > MAX_BATCH_SIZE) {
    throw new EngineError("BATCH_LIMIT", `maximum ${MAX_BATCH_SIZE} contracts per batch, got ${count}`);
  }
}

/**
 * Runs every item through the analyzer concurrently and returns once all have settled.
 * Item failures are reported per item and never cancel siblings. When `signal` aborts,
 * items still running or not yet started fail with DEADLINE_EXCEEDED; finished ones are kept.
 */
export async function analyzeBatch(
  analyzer: Pick<ContractAnalyzer, "analyze">,
  items: readonly BatchItem[],
  opts: { concurrency?: number; signal?: AbortSignal } = {}
): Promise<BatchReport> {
  assertBatchSize(items.length);

  const outcomes = await asyncPool(opts.concurrency ?? MAX_BATCH_SIZE, items, async (item): Promise<Outcome> => {
    const chainLabel = item.chain?.trim() || "ethereum";
    try {
      const address = item.address.trim();
      assertEthAddress(address, "contract address");
      const chain: ChainId = parseChain(item.chain);
      const result = await withDeadline(
        analyzer.analyze(address, chain, { signal: opts.signal }),
        opts.signal,
        "contract analysis"
      );
      return { ok: true, result };
    } catch (e) {
      logger.warn(`batch item ${item.address} on ${chainLabel} failed: ${errorMessage(e)}`);
      const error: BatchItemError = { address: item.address, chain: chainLabel, error: errorMessage(e) };
      if (isEngineError(e)) error.code = e.code;
      return { ok: false, error };
    }
  });

  const results: ContractAnalysisResult[] = [];
  const errors: BatchItemError[] = [];
  for (const o of outcomes) {
    if (o.ok) results.push(o.result);
    else errors.push(o.error);
  }

  logger.info(`batch analysis done: ${results.length}/${items.length} succeeded`);
  return { results, errors, total: items.length, success: results.length, failed: errors.length };
}
