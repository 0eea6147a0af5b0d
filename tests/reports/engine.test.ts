import { describe, expect, it, vi } from "vitest";
import { ApprovalScanner } from "../../src/reports/engine.js";
import { SymbolResolver } from "../../src/registry/symbols.js";
import { ExpiringCache } from "../../src/cache/expiringCache.js";
import type { RateLimiter } from "../../src/core/rateLimiter.js";
import { DeadlineExceededError } from "../../src/core/errors.js";
import type { ChainId } from "../../src/chains.js";
import type { ApprovalLogsResult } from "../../src/eth/sources/types.js";
import { DAI, PINK_DRAINER, UNISWAP_V3_ROUTER_2, UNLISTED_SPENDER, USDC, WALLET, approvalLog, fakeSource } from "../helpers.js";

const NOW = 1_700_000_000_000;

function makeScanner(approvals: Partial<Record<ChainId, ApprovalLogsResult | Error>>) {
  const source = fakeSource({ approvals });
  const rateLimiter: RateLimiter = { acquire: vi.fn(async () => undefined) };
  const symbols = new SymbolResolver({
    source,
    cache: new ExpiringCache<string>(60_000, () => NOW),
    callTimeoutMs: 1000
  });
  const scanner = new ApprovalScanner({ source, symbols, rateLimiter, now: () => NOW });
  return { scanner, source, rateLimiter };
}

function answer(...logs: ReturnType<typeof approvalLog>[]): ApprovalLogsResult {
  return { logs, source: "rpc", failures: [] };
}

describe("ApprovalScanner", () => {
  it("classifies an unlimited USDC approval to a trusted router as a warning", async () => {
    const { scanner } = makeScanner({ ethereum: answer(approvalLog(USDC, UNISWAP_V3_ROUTER_2, 2n ** 255n)) });
    const result = await scanner.scanWallet(WALLET, ["ethereum"]);

    expect(result.approvals).toHaveLength(1);
    expect(result.approvals[0]).toMatchObject({
      chain: "ethereum",
      tokenSymbol: "USDC",
      spenderName: "Uniswap V3: Router 2",
      spenderTier: "trusted",
      isUnlimited: true,
      riskLevel: "warning",
      allowanceHuman: "UNLIMITED",
      allowanceRaw: (2n ** 255n).toString(),
      riskScore: 10,
      lastUpdated: 1_700_000_000
    });
  });

  it("classifies a limited approval to an unlisted spender as a warning", async () => {
    const { scanner } = makeScanner({ ethereum: answer(approvalLog(USDC, UNLISTED_SPENDER, 500_000_000n)) });
    const [a] = (await scanner.scanWallet(WALLET, ["ethereum"])).approvals;

    expect(a?.isUnlimited).toBe(false);
    expect(a?.riskLevel).toBe("warning");
    expect(a?.allowanceHuman).toBe("500.00");
    expect(a?.spenderName).toBe("0x1111...1111");
    expect(a?.riskScore).toBe(25);
  });

  it("marks any approval to a known drainer as critical", async () => {
    const { scanner } = makeScanner({ ethereum: answer(approvalLog(DAI, PINK_DRAINER, 1n)) });
    const [a] = (await scanner.scanWallet(WALLET, ["ethereum"])).approvals;

    expect(a?.riskLevel).toBe("critical");
    expect(a?.riskReasons).toEqual(["Known malicious contract"]);
    expect(a?.allowanceHuman).toBe("0.00");
  });

  it("aggregates counts, score, contract risks and recommendations", async () => {
    const { scanner } = makeScanner({
      ethereum: answer(
        approvalLog(USDC, UNISWAP_V3_ROUTER_2, 2n ** 255n),
        approvalLog(USDC, UNLISTED_SPENDER, 500_000_000n),
        approvalLog(DAI, PINK_DRAINER, 1n)
      )
    });
    const result = await scanner.scanWallet(WALLET, ["ethereum"]);

    expect(result.totalApprovals).toBe(3);
    expect(result.criticalRisks).toBe(1);
    expect(result.warnings).toBe(2);
    expect(result.overallRiskScore).toBe(85);
    expect(result.scanTimestamp).toBe(1_700_000_000);
    expect(result.contractRisks).toEqual([
      {
        address: PINK_DRAINER,
        chain: "ethereum",
        name: "DRAINER: Pink Drainer",
        tier: "malicious",
        riskLevel: "critical",
        approvalCount: 1,
        tokens: ["DAI"]
      }
    ]);
    expect(result.recommendations).toEqual([
      "URGENT: Revoke 1 critical approvals immediately",
      "You have 1 unlimited approvals. Consider setting specific limits.",
      "1 approvals are to unknown contracts. Verify these are legitimate.",
      "Your wallet has elevated risk. Review all approvals carefully."
    ]);
  });

  it("ignores zero-allowance events when classifying", async () => {
    const { scanner } = makeScanner({
      ethereum: answer(approvalLog(DAI, PINK_DRAINER, 2n ** 256n - 1n), approvalLog(DAI, PINK_DRAINER, 0n))
    });
    const result = await scanner.scanWallet(WALLET, ["ethereum"]);

    expect(result.totalApprovals).toBe(1);
    expect(result.approvals[0]).toMatchObject({
      spenderAddress: PINK_DRAINER,
      isUnlimited: true,
      allowanceHuman: "UNLIMITED",
      riskLevel: "critical"
    });
  });

  it("appends chains in traversal order through the rate limiter", async () => {
    const { scanner, rateLimiter } = makeScanner({
      polygon: answer(approvalLog(DAI, UNISWAP_V3_ROUTER_2, 5n)),
      ethereum: answer(approvalLog(USDC, UNISWAP_V3_ROUTER_2, 5n))
    });
    const result = await scanner.scanWallet(WALLET, ["polygon", "ethereum"]);

    expect(result.approvals.map((a) => a.chain)).toEqual(["polygon", "ethereum"]);
    expect(result.chainsScanned).toEqual(["polygon", "ethereum"]);
    expect(rateLimiter.acquire).toHaveBeenCalledTimes(2);
  });

  it("reports chains where every source failed as degraded and keeps scanning", async () => {
    const { scanner } = makeScanner({
      base: { logs: [], source: null, failures: [{ source: "rpc", error: "boom" }] },
      arbitrum: new Error("socket hang up"),
      ethereum: answer(approvalLog(USDC, UNISWAP_V3_ROUTER_2, 5n)),
      optimism: { logs: [], source: "rpc", failures: [] }
    });
    const result = await scanner.scanWallet(WALLET, ["base", "arbitrum", "ethereum", "optimism"]);

    expect(result.degradedChains).toEqual(["base", "arbitrum"]);
    expect(result.totalApprovals).toBe(1);
  });

  it("aborts the whole scan once the deadline passes", async () => {
    const { scanner, source } = makeScanner({});
    const controller = new AbortController();
    source.fetchApprovals.mockImplementation(async () => {
      controller.abort();
      throw new Error("aborted");
    });

    await expect(scanner.scanWallet(WALLET, ["ethereum", "polygon"], { signal: controller.signal })).rejects.toBeInstanceOf(
      DeadlineExceededError
    );
    expect(source.fetchApprovals).toHaveBeenCalledTimes(1);
  });

  it("returns a frozen result", async () => {
    const { scanner } = makeScanner({ ethereum: answer(approvalLog(USDC, UNISWAP_V3_ROUTER_2, 5n)) });
    const result = await scanner.scanWallet(WALLET, ["ethereum"]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.approvals)).toBe(true);
    expect(Object.isFrozen(result.approvals[0])).toBe(true);
  });
});
