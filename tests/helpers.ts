import { vi, type Mock } from "vitest";
import type { ChainId } from "../src/chains.js";
import { APPROVAL_TOPIC, topicOfAddress } from "../src/eth/erc20.js";
import type { ApprovalLogsResult, ChainDataSource, RawApprovalLog } from "../src/eth/sources/types.js";
import type { Approval, WalletScanResult } from "../src/reports/types.js";

export const WALLET = "0x1234567890abcdef1234567890abcdef12345678";

export const USDC = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
export const DAI = "0x6b175474e89094c44da98b954eedeac495271d0f";
export const UNISWAP_V3_ROUTER_2 = "0x68b3465833fb72a70ecdf485e0e4c7bd8665fc45";
export const PINK_DRAINER = "0x000000000000084e91743124a982076c59f10084";
export const UNLISTED_SPENDER = "0x1111111111111111111111111111111111111111";

export function approvalLog(token: string, spender: string, value: bigint, owner = WALLET): RawApprovalLog {
  return {
    address: token,
    topics: [APPROVAL_TOPIC, topicOfAddress(owner), topicOfAddress(spender)],
    data: "0x" + value.toString(16).padStart(64, "0")
  };
}

export function makeApproval(overrides: Partial<Approval> = {}): Approval {
  return {
    chain: "ethereum",
    tokenAddress: DAI,
    tokenSymbol: "DAI",
    spenderAddress: UNISWAP_V3_ROUTER_2,
    spenderName: "Uniswap V3: Router 2",
    spenderTier: "trusted",
    allowanceRaw: "1000",
    allowanceHuman: "0.00",
    isUnlimited: false,
    riskLevel: "safe",
    riskReasons: [],
    riskScore: 2,
    lastUpdated: 1_700_000_000,
    ...overrides
  };
}

/** In-process data source: approval answers per chain, bytecode per address. */
export function fakeSource(
  opts: {
    approvals?: Partial<Record<ChainId, ApprovalLogsResult | Error>>;
    bytecode?: Record<string, Uint8Array | Error>;
  } = {}
): ChainDataSource & {
  fetchApprovals: Mock<(wallet: string, chain: ChainId, signal?: AbortSignal) => Promise<ApprovalLogsResult>>;
} {
  const fetchApprovals = vi.fn(async (_wallet: string, chain: ChainId, _signal?: AbortSignal): Promise<ApprovalLogsResult> => {
    const answer = opts.approvals?.[chain];
    if (answer instanceof Error) throw answer;
    return answer ?? { logs: [], source: "rpc", failures: [] };
  });

  return {
    name: "fake",
    supports: () => true,
    fetchApprovals,
    fetchApprovalLogs: async (wallet, chain, signal) => (await fetchApprovals(wallet, chain, signal)).logs,
    fetchBytecode: async (address) => {
      const code = opts.bytecode?.[address.toLowerCase()];
      if (code instanceof Error) throw code;
      return code ?? new Uint8Array();
    },
    call: async () => "0x"
  };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (v: T) => void;
  reject: (e: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function makeResult(overrides: Partial<WalletScanResult> = {}): WalletScanResult {
  return {
    walletAddress: WALLET,
    scanTimestamp: 1_700_000_000,
    overallRiskScore: 0,
    totalApprovals: 0,
    criticalRisks: 0,
    warnings: 0,
    chainsScanned: ["ethereum"],
    degradedChains: [],
    approvals: [],
    contractRisks: [],
    recommendations: [],
    runtimeMs: 12,
    ...overrides
  };
}
