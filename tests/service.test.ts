import { describe, expect, it, vi } from "vitest";
import { createRiskService, SERVICE_NAME } from "../src/service.js";
import type { DecompilationSummary, SecurityReport } from "../src/analysis/types.js";
import type { ApprovalLogsResult } from "../src/eth/sources/types.js";
import type { ChainId } from "../src/chains.js";
import { isEngineError } from "../src/core/errors.js";
import { DAI, UNISWAP_V3_ROUTER_2, USDC, WALLET, approvalLog, fakeSource } from "./helpers.js";

const REPORT: SecurityReport = { riskScore: 30, riskLevel: "medium", vulnerabilities: [], patterns: [], recommendations: [] };

function setup() {
  const source = fakeSource({
    approvals: { ethereum: { logs: [approvalLog(USDC, UNISWAP_V3_ROUTER_2, 10n ** 6n)], source: "rpc", failures: [] } },
    bytecode: { [USDC]: new Uint8Array([0x60]), [DAI]: new Uint8Array([0x61]) }
  });
  const decompiler = { decompile: vi.fn(async (): Promise<DecompilationSummary> => Promise.reject(new Error("offline"))) };
  const analyzer = {
    analyze: vi.fn(async (_input: { address: string; chain: ChainId; bytecode: Uint8Array }, _signal?: AbortSignal) => REPORT)
  };
  const service = createRiskService({
    source,
    decompiler,
    analyzer,
    rateLimiter: { acquire: async () => undefined },
    settings: { scanTimeoutMs: 50, batchTimeoutMs: 100, decompilerUrl: "http://decompiler.test", analyzerUrl: "http://analyzer.test" },
    now: () => 1_700_000_000_000
  });
  return { service, source, analyzer };
}

describe("createRiskService", () => {
  it("scans the requested chains", async () => {
    const { service, source } = setup();
    const result = await service.scanWallet({ wallet: ` ${WALLET} `, chains: "Ethereum, base" });

    expect(result.walletAddress).toBe(WALLET);
    expect(result.chainsScanned).toEqual(["ethereum", "base"]);
    expect(result.approvals.map((a) => a.allowanceHuman)).toEqual(["1.00"]);
    expect(source.fetchApprovals).toHaveBeenCalledTimes(2);
  });

  it("validates before touching any source", async () => {
    const { service, source } = setup();

    await expect(service.scanWallet({ wallet: "  " })).rejects.toThrow("wallet address required");
    await expect(service.scanWallet({ wallet: "0x123" })).rejects.toThrow("invalid wallet address format: 0x123");
    const badChain = await service.scanWallet({ wallet: WALLET, chains: "ethereum,solana" }).catch((e: unknown) => e);
    expect(isEngineError(badChain, "UNSUPPORTED_CHAIN")).toBe(true);
    await expect(service.analyzeContract({ address: "" })).rejects.toThrow("contract address required");

    expect(source.fetchApprovals).not.toHaveBeenCalled();
  });

  it("fails a scan that outlives its deadline", async () => {
    const { service, source } = setup();
    source.fetchApprovals.mockImplementation(() => new Promise<ApprovalLogsResult>(() => undefined));

    const err = await service.scanWallet({ wallet: WALLET, chains: "ethereum" }).catch((e: unknown) => e);
    expect(isEngineError(err, "DEADLINE_EXCEEDED")).toBe(true);
    expect(err).toHaveProperty("message", "wallet scan timed out");
  });

  it("honors a caller signal that is already aborted", async () => {
    const { service } = setup();
    const ctl = new AbortController();
    ctl.abort();
    const err = await service.analyzeContract({ address: USDC }, { signal: ctl.signal }).catch((e: unknown) => e);
    expect(err).toHaveProperty("message", "contract analysis timed out");
  });

  it("analyzes a contract on the default chain", async () => {
    const { service, analyzer } = setup();
    const result = await service.analyzeContract({ address: USDC });

    expect(result.chain).toBe("ethereum");
    expect(result.overallRisk).toBe(30);
    expect(result.decompilation).toBeUndefined();
    expect(analyzer.analyze).toHaveBeenCalledOnce();
  });

  it("keeps finished batch items when the batch deadline fires", async () => {
    const { service, analyzer } = setup();
    analyzer.analyze.mockImplementation((input) =>
      input.address === DAI ? new Promise<SecurityReport>(() => undefined) : Promise.resolve(REPORT)
    );

    const report = await service.analyzeBatch([{ address: USDC }, { address: DAI }]);

    expect(report).toMatchObject({ total: 2, success: 1, failed: 1 });
    expect(report.results[0]?.address).toBe(USDC);
    expect(report.errors).toEqual([
      { address: DAI, chain: "ethereum", error: "contract analysis timed out", code: "DEADLINE_EXCEEDED" }
    ]);
  });

  it("rejects an oversized batch up front", async () => {
    const { service } = setup();
    const items = Array.from({ length: 11 }, () => ({ address: USDC }));
    const err = await service.analyzeBatch(items).catch((e: unknown) => e);
    expect(isEngineError(err, "BATCH_LIMIT")).toBe(true);
  });

  it("refuses an unknown scan rate limiter", () => {
    expect(() => createRiskService({ source: fakeSource(), settings: { scanRateLimiter: "leaky" } })).toThrow(
      "unknown rate limiter: leaky (expected fixed or token-bucket)"
    );
  });

  it("reports health and chains", () => {
    const { service } = setup();
    const health = service.health();

    expect(health).toMatchObject({
      status: "healthy",
      service: SERVICE_NAME,
      services: { decompiler: "http://decompiler.test", analyzer: "http://analyzer.test" }
    });
    expect(health.chains).toBe(service.listChains().length);
    expect(health.operations).toContain("analyzeBatch");
  });
});
