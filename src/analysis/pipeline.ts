import { logger } from "../core/logger.js";
import { DeadlineExceededError, EngineError, errorMessage, isEngineError } from "../core/errors.js";
import type { ExpiringCache } from "../cache/expiringCache.js";
import type { ChainId } from "../chains.js";
import type { ChainDataSource } from "../eth/sources/types.js";
import type { ContractAnalysisResult, Decompiler, SecurityAnalyzer } from "./types.js";

export type ContractAnalyzerDeps = {
  source: Pick<ChainDataSource, "fetchBytecode">;
  decompiler: Decompiler;
  analyzer: SecurityAnalyzer;
  cache: ExpiringCache<ContractAnalysisResult>;
  now?: () => number;
};

export function analysisCacheKey(chain: ChainId, address: string): string {
  return `analysis:${chain}:${address.toLowerCase()}`;
}

/**
 * Cache check, bytecode, then decompile and security analysis side by side.
 * Only the bytecode stage is fatal; a failing service leaves its field unset.
 */
export class ContractAnalyzer {
  private readonly now: () => number;

  constructor(private readonly deps: ContractAnalyzerDeps) {
    this.now = deps.now ?? Date.now;
  }

  async analyze(address: string, chain: ChainId, opts: { signal?: AbortSignal } = {}): Promise<ContractAnalysisResult> {
    const { signal } = opts;
    const key = analysisCacheKey(chain, address);

    const cached = this.deps.cache.get(key);
    if (cached) {
      logger.debug(`[${chain}] analysis cache hit for ${address}`);
      return cached;
    }

    logger.info(`[${chain}] starting analysis of ${address}`);
    const bytecode = await this.fetchBytecode(address, chain, signal);

    const [decompiled, security] = await Promise.allSettled([
      this.deps.decompiler.decompile(bytecode, signal),
      this.deps.analyzer.analyze({ address, chain, bytecode }, signal)
    ]);
    if (signal?.aborted) throw new DeadlineExceededError("contract analysis");

    const result: ContractAnalysisResult = {
      address,
      chain,
      bytecodeSize: bytecode.length,
      overallRisk: 0,
      analyzedAt: Math.floor(this.now() / 1000)
    };

    if (decompiled.status === "fulfilled") {
      result.decompilation = decompiled.value;
    } else {
      logger.warn(`[${chain}] decompiler unavailable for ${address}: ${errorMessage(decompiled.reason)}`);
    }

    if (security.status === "fulfilled") {
      result.security = security.value;
      result.overallRisk = security.value.riskScore;
    } else {
      logger.warn(`[${chain}] security analyzer unavailable for ${address}: ${errorMessage(security.reason)}`);
    }

    Object.freeze(result);
    this.deps.cache.set(key, result);
    logger.info(`[${chain}] analysis complete for ${address}: risk=${result.overallRisk} bytecode=${result.bytecodeSize} bytes`);
    return result;
  }

  private async fetchBytecode(address: string, chain: ChainId, signal?: AbortSignal): Promise<Uint8Array> {
    let code: Uint8Array;
    try {
      code = await this.deps.source.fetchBytecode(address, chain, signal);
    } catch (e) {
      if (signal?.aborted) throw new DeadlineExceededError("contract analysis");
      if (isEngineError(e)) throw e;
      throw new EngineError("UPSTREAM", `failed to fetch bytecode: ${errorMessage(e)}`, { cause: e });
    }
    if (code.length === 0) {
      throw new EngineError("NOT_A_CONTRACT", "no bytecode found (not a contract or EOA)");
    }
    return code;
  }
}
