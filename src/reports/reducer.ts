import { addressFromTopic } from "../eth/erc20.js";
import type { RawApprovalLog } from "../eth/sources/types.js";
import { isUnlimited } from "./unlimited.js";

export type ApprovalEvent = {
  tokenAddress: string;
  spenderAddress: string;
  allowanceRaw: bigint;
};

export type ReducedApproval = ApprovalEvent & {
  isUnlimited: boolean;
};

/** Approval(owner, spender, value): spender is topic 2, value is the data word. */
export function decodeApprovalLog(log: RawApprovalLog): ApprovalEvent | null {
  const spenderTopic = log.topics[2];
  if (log.topics.length < 3 || spenderTopic === undefined) return null;

  const data = log.data === "0x" || log.data === "" ? "0x0" : log.data;
  let allowanceRaw: bigint;
  try {
    allowanceRaw = BigInt(data);
  } catch {
    return null;
  }

  return {
    tokenAddress: log.address,
    spenderAddress: addressFromTopic(spenderTopic),
    allowanceRaw
  };
}

export function pairKey(tokenAddress: string, spenderAddress: string): string {
  return `${tokenAddress.toLowerCase()}-${spenderAddress.toLowerCase()}`;
}

/**
 * Latest state per (token, spender), last event in input order wins. Input order is the
 * provider's response order; block numbers are not compared. Zero-allowance events are
 * skipped without touching the pair's earlier state.
 */
export function reduceApprovalEvents(events: readonly ApprovalEvent[]): ReducedApproval[] {
  const latest = new Map<string, ReducedApproval>();

  for (const e of events) {
    if (e.allowanceRaw === 0n) continue;
    latest.set(pairKey(e.tokenAddress, e.spenderAddress), {
      tokenAddress: e.tokenAddress,
      spenderAddress: e.spenderAddress,
      allowanceRaw: e.allowanceRaw,
      isUnlimited: isUnlimited(e.allowanceRaw)
    });
  }

  return Array.from(latest.values());
}
