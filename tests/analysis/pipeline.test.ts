import { describe, expect, it, vi } from "vitest";
import { ExpiringCache } from "../../src/cache/expiringCache.js";
import { ContractAnalyzer, analysisCacheKey } from "../../src/analysis/pipeline.js";
import type { ContractAnalysisResult, DecompilationSummary, SecurityReport } from "../../src/analysis/types.js";
import { isEngineError } from "../../src/core/errors.js";
import { DAI, USDC, fakeSource } from "../helpers.js";

const SUMMARY: DecompilationSummary = {
  success: true,
  opcodes: ["PUSH1"],
  functions: [],
  selectors: ["0x095ea7b3"],
  isProxy: false,
  hasSstore: true,
  hasCall: false,
  complexity: 3,
  warnings: []
};

const REPORT: SecurityReport = {
  riskScore: 62,
  riskLevel: "medium",
  vulnerabilities: [],
  patterns: [],
  recommendations: []
};

function setup(opts: { decompile?: () => Promise<DecompilationSummary>; analyze?: () => Promise<SecurityReport> } = {}) {
  const source = fakeSource({
    bytecode: { [USDC]: new Uint8Array([0x60, 0x80]), [DAI]: new Error("rpc down") }
  });
  const fetchBytecode = vi.spyOn(source, "fetchBytecode");
  const decompiler = { decompile: vi.fn(opts.decompile ?? (async () => SUMMARY)) };
  const analyzer = { analyze: vi.fn(opts.analyze ?? (async () => REPORT)) };
  const cache = new ExpiringCache<ContractAnalysisResult>(60_000, () => 1_700_000_000_000);
  const pipeline = new ContractAnalyzer({ source, decompiler, analyzer, cache, now: () => 1_700_000_000_000 });
  return { pipeline, fetchBytecode, decompiler, analyzer, cache };
}

describe("ContractAnalyzer", () => {
  it("combines both services and caches the result", async () => {
    const { pipeline, fetchBytecode, decompiler, analyzer } = setup();

    const result = await pipeline.analyze(USDC, "ethereum");
    expect(result).toEqual({
      address: USDC,
      chain: "ethereum",
      bytecodeSize: 2,
      decompilation: SUMMARY,
      security: REPORT,
      overallRisk: 62,
      analyzedAt: 1_700_000_000
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(analyzer.analyze).toHaveBeenCalledWith(
      { address: USDC, chain: "ethereum", bytecode: new Uint8Array([0x60, 0x80]) },
      undefined
    );

    const again = await pipeline.analyze(USDC.toUpperCase().replace("0X", "0x"), "ethereum");
    expect(again).toBe(result);
    expect(fetchBytecode).toHaveBeenCalledOnce();
    expect(decompiler.decompile).toHaveBeenCalledOnce();
  });

  it("keys the cache per chain", async () => {
    const { pipeline, cache } = setup();
    await pipeline.analyze(USDC, "base");
    expect(cache.has(analysisCacheKey("base", USDC))).toBe(true);
    expect(cache.has(analysisCacheKey("ethereum", USDC))).toBe(false);
  });

  it("rejects addresses without code", async () => {
    const { pipeline, decompiler } = setup();
    const err = await pipeline.analyze("0x2222222222222222222222222222222222222222", "ethereum").catch((e: unknown) => e);
    expect(isEngineError(err, "NOT_A_CONTRACT")).toBe(true);
    expect(decompiler.decompile).not.toHaveBeenCalled();
  });

  it("wraps bytecode failures as UPSTREAM", async () => {
    const { pipeline } = setup();
    const err = await pipeline.analyze(DAI, "ethereum").catch((e: unknown) => e);
    expect(isEngineError(err, "UPSTREAM")).toBe(true);
    expect(err).toHaveProperty("message", "failed to fetch bytecode: rpc down");
  });

  it("tolerates a failing decompiler", async () => {
    const { pipeline } = setup({ decompile: async () => Promise.reject(new Error("503")) });
    const result = await pipeline.analyze(USDC, "ethereum");
    expect(result.decompilation).toBeUndefined();
    expect(result.overallRisk).toBe(62);
  });

  it("scores 0 when the security analyzer fails", async () => {
    const { pipeline } = setup({ analyze: async () => Promise.reject(new Error("503")) });
    const result = await pipeline.analyze(USDC, "ethereum");
    expect(result.security).toBeUndefined();
    expect(result.decompilation).toEqual(SUMMARY);
    expect(result.overallRisk).toBe(0);
  });
});
