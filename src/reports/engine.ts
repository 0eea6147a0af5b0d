import { logger } from "../core/logger.js";
import { asyncPool } from "../core/async.js";
import { DeadlineExceededError, errorMessage, isEngineError } from "../core/errors.js";
import type { RateLimiter } from "../core/rateLimiter.js";
import type { ChainId } from "../chains.js";
import type { ApprovalLogsResult } from "../eth/sources/types.js";
import { getSpenderInfo } from "../registry/spenders.js";
import { getTokenDecimals } from "../registry/tokens.js";
import type { SymbolResolver } from "../registry/symbols.js";
import { formatAllowance } from "./format.js";
import { decodeApprovalLog, reduceApprovalEvents, type ApprovalEvent } from "./reducer.js";
import { aggregateRisk, classifyApproval } from "./scoring.js";
import { generateRecommendations } from "./recommendations.js";
import type { Approval, ContractRisk, WalletScanResult } from "./types.js";

export type ScanPhase = "idle" | "scanning-chain" | "reducing" | "classifying" | "aggregating" | "done";

export type ApprovalScannerDeps = {
  source: { fetchApprovals(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<ApprovalLogsResult> };
  symbols: Pick<SymbolResolver, "resolve">;
  rateLimiter: RateLimiter;
  /** Chains in flight at once; 1 keeps the scan sequential. */
  chainConcurrency?: number;
  symbolConcurrency?: number;
  now?: () => number;
};

type ChainScan = {
  chain: ChainId;
  approvals: Approval[];
  degraded: boolean;
};

export class ApprovalScanner {
  private readonly now: () => number;

  constructor(private readonly deps: ApprovalScannerDeps) {
    this.now = deps.now ?? Date.now;
  }

  private trace(wallet: string, phase: ScanPhase, detail = ""): void {
    logger.debug(`scan ${wallet}: ${phase}${detail ? ` ${detail}` : ""}`);
  }

  /**
   * Scans `chains` in order and builds the wallet report. A chain whose sources all fail
   * contributes nothing and is listed in `degradedChains`; only the deadline aborts the scan.
   */
  async scanWallet(wallet: string, chains: readonly ChainId[], opts: { signal?: AbortSignal } = {}): Promise<WalletScanResult> {
    const t0 = this.now();
    const { signal } = opts;
    this.trace(wallet, "idle", `chains=${chains.join(",")}`);

    const perChain = await asyncPool(this.deps.chainConcurrency ?? 1, chains, async (chain) => {
      await this.deps.rateLimiter.acquire(signal);
      return this.scanChain(wallet, chain, signal);
    });

    this.trace(wallet, "aggregating");
    const approvals = perChain.flatMap((c) => c.approvals);
    const degradedChains = perChain.filter((c) => c.degraded).map((c) => c.chain);
    const agg = aggregateRisk(approvals);

    const result: WalletScanResult = {
      walletAddress: wallet,
      scanTimestamp: Math.floor(t0 / 1000),
      overallRiskScore: agg.overallRiskScore,
      totalApprovals: approvals.length,
      criticalRisks: agg.criticalRisks,
      warnings: agg.warnings,
      chainsScanned: [...chains],
      degradedChains,
      approvals,
      contractRisks: buildContractRisks(approvals),
      recommendations: generateRecommendations({
        approvals,
        criticalRisks: agg.criticalRisks,
        overallRiskScore: agg.overallRiskScore,
        chains
      }),
      runtimeMs: this.now() - t0
    };

    this.trace(wallet, "done", `approvals=${approvals.length} score=${agg.overallRiskScore}`);
    return freezeResult(result);
  }

  private async scanChain(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<ChainScan> {
    this.trace(wallet, "scanning-chain", chain);

    let fetched: ApprovalLogsResult;
    try {
      fetched = await this.deps.source.fetchApprovals(wallet, chain, signal);
    } catch (e) {
      if (signal?.aborted || isEngineError(e, "DEADLINE_EXCEEDED")) throw new DeadlineExceededError("wallet scan");
      logger.warn(`[${chain}] approval scan failed: ${errorMessage(e)}`);
      return { chain, approvals: [], degraded: true };
    }

    const degraded = fetched.source === null && fetched.failures.length > 0;
    if (degraded) logger.warn(`[${chain}] no source answered, chain contributes no approvals`);

    this.trace(wallet, "reducing", `${chain} events=${fetched.logs.length}`);
    const events: ApprovalEvent[] = [];
    for (const log of fetched.logs) {
      const e = decodeApprovalLog(log);
      if (e) events.push(e);
    }
    const reduced = reduceApprovalEvents(events);

    this.trace(wallet, "classifying", `${chain} approvals=${reduced.length}`);
    const tokens = Array.from(new Set(reduced.map((r) => r.tokenAddress.toLowerCase())));
    const symbols = await asyncPool(this.deps.symbolConcurrency ?? 4, tokens, (t) =>
      this.deps.symbols.resolve(chain, t, signal)
    );
    const symbolByToken = new Map(tokens.map((t, i) => [t, symbols[i] ?? t]));

    const lastUpdated = Math.floor(this.now() / 1000);
    const approvals = reduced.map((r): Approval => {
      const spender = getSpenderInfo(r.spenderAddress);
      const classified = classifyApproval({ tier: spender.tier, isUnlimited: r.isUnlimited, spenderName: spender.name });
      return {
        chain,
        tokenAddress: r.tokenAddress,
        tokenSymbol: symbolByToken.get(r.tokenAddress.toLowerCase()) ?? r.tokenAddress,
        spenderAddress: r.spenderAddress,
        spenderName: spender.name,
        spenderTier: spender.tier,
        allowanceRaw: r.allowanceRaw.toString(),
        allowanceHuman: formatAllowance(r.allowanceRaw, getTokenDecimals(r.tokenAddress)),
        isUnlimited: r.isUnlimited,
        riskLevel: classified.riskLevel,
        riskReasons: classified.reasons,
        riskScore: classified.score,
        lastUpdated
      };
    });

    logger.info(`[${chain}] ${approvals.length} active approvals${fetched.source ? ` via ${fetched.source}` : ""}`);
    return { chain, approvals, degraded };
  }
}

/** Critical approvals grouped by (chain, spender), in first-seen order. */
export function buildContractRisks(approvals: readonly Approval[]): ContractRisk[] {
  const byKey = new Map<string, ContractRisk>();
  for (const a of approvals) {
    if (a.riskLevel !== "critical") continue;
    const key = `${a.chain}:${a.spenderAddress.toLowerCase()}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.approvalCount++;
      if (!existing.tokens.includes(a.tokenSymbol)) existing.tokens.push(a.tokenSymbol);
      continue;
    }
    byKey.set(key, {
      address: a.spenderAddress,
      chain: a.chain,
      name: a.spenderName,
      tier: a.spenderTier,
      riskLevel: a.riskLevel,
      approvalCount: 1,
      tokens: [a.tokenSymbol]
    });
  }
  return Array.from(byKey.values());
}

function freezeResult(result: WalletScanResult): WalletScanResult {
  for (const a of result.approvals) {
    Object.freeze(a.riskReasons);
    Object.freeze(a);
  }
  for (const c of result.contractRisks) {
    Object.freeze(c.tokens);
    Object.freeze(c);
  }
  Object.freeze(result.approvals);
  Object.freeze(result.contractRisks);
  Object.freeze(result.recommendations);
  Object.freeze(result.chainsScanned);
  Object.freeze(result.degradedChains);
  return Object.freeze(result);
}
