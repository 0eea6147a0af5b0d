import { logger } from "../../core/logger.js";
import { DeadlineExceededError, EngineError, errorMessage } from "../../core/errors.js";
import type { ChainId } from "../../chains.js";
import type { ApprovalLogsResult, ChainDataSource, RawApprovalLog, SourceFailure } from "./types.js";

/**
 * Ordered fallback over interchangeable sources. Approval queries move on when a source
 * fails or answers with nothing; bytecode reads only on failure, since empty code is an answer.
 */
export class FallbackChainSource implements ChainDataSource {
  readonly name: string;

  constructor(private readonly sources: readonly ChainDataSource[]) {
    this.name = sources.map((s) => s.name).join(">");
  }

  supports(chain: ChainId): boolean {
    return this.sources.some((s) => s.supports(chain));
  }

  async fetchApprovals(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<ApprovalLogsResult> {
    const failures: SourceFailure[] = [];
    let answered: string | null = null;

    for (const source of this.sources) {
      if (!source.supports(chain)) {
        logger.debug(`[${chain}] ${source.name} does not serve this chain, skipping`);
        continue;
      }
      try {
        const logs = await source.fetchApprovalLogs(wallet, chain, signal);
        answered = source.name;
        if (logs.length > 0) return { logs, source: source.name, failures };
        logger.info(`[${chain}] ${source.name} returned 0 approval events, trying next source`);
      } catch (e) {
        if (signal?.aborted) throw new DeadlineExceededError(`[${chain}] approval scan`);
        failures.push({ source: source.name, error: errorMessage(e) });
        logger.warn(`[${chain}] ${source.name} approval query failed: ${errorMessage(e)}`);
      }
    }

    return { logs: [], source: answered, failures };
  }

  async fetchApprovalLogs(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<RawApprovalLog[]> {
    const { logs } = await this.fetchApprovals(wallet, chain, signal);
    return logs;
  }

  async fetchBytecode(address: string, chain: ChainId, signal?: AbortSignal): Promise<Uint8Array> {
    let lastError: unknown = null;
    for (const source of this.sources) {
      if (!source.supports(chain)) continue;
      try {
        return await source.fetchBytecode(address, chain, signal);
      } catch (e) {
        if (signal?.aborted) throw new DeadlineExceededError(`[${chain}] bytecode fetch`);
        lastError = e;
        logger.warn(`[${chain}] ${source.name} bytecode fetch failed for ${address}: ${errorMessage(e)}`);
      }
    }
    const reason = lastError === null ? `no source serves ${chain}` : errorMessage(lastError);
    throw new EngineError("UPSTREAM", `failed to fetch bytecode: ${reason}`, { cause: lastError });
  }

  async call(to: string, data: string, chain: ChainId, signal?: AbortSignal): Promise<string> {
    let lastError: unknown = null;
    let answered = false;
    for (const source of this.sources) {
      if (!source.supports(chain)) continue;
      try {
        const result = await source.call(to, data, chain, signal);
        answered = true;
        if (result !== "0x") return result;
      } catch (e) {
        if (signal?.aborted) throw new DeadlineExceededError(`[${chain}] eth_call`);
        lastError = e;
      }
    }
    if (answered) return "0x";
    const reason = lastError === null ? `no source serves ${chain}` : errorMessage(lastError);
    throw new EngineError("UPSTREAM", `eth_call to ${to} failed: ${reason}`, { cause: lastError });
  }
}
