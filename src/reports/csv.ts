import { getTokenDecimals } from "../registry/tokens.js";
import { formatUnitsSafe } from "./format.js";
import { buildRevokeLink } from "./revokeLinks.js";
import type { Approval, WalletScanResult } from "./types.js";

export function csvEscape(v: string): string {
  if (v.includes('"') || v.includes(",") || v.includes("\n") || v.includes("\r")) {
    return `"${v.replace(/"/g, '""')}"`;
  }
  return v;
}

export const CSV_HEADER = [
  "chain",
  "token_address",
  "token_symbol",
  "spender_address",
  "spender_name",
  "spender_tier",
  "allowance_raw",
  "allowance_units",
  "allowance_human",
  "is_unlimited",
  "risk_level",
  "risk_score",
  "risk_reasons",
  "revoke_link"
] as const;

function approvalToRow(owner: string, a: Approval): string[] {
  return [
    a.chain,
    a.tokenAddress,
    a.tokenSymbol,
    a.spenderAddress,
    a.spenderName,
    a.spenderTier,
    a.allowanceRaw,
    formatUnitsSafe(BigInt(a.allowanceRaw), getTokenDecimals(a.tokenAddress)),
    a.allowanceHuman,
    a.isUnlimited ? "true" : "false",
    a.riskLevel,
    String(a.riskScore),
    a.riskReasons.join(";"),
    buildRevokeLink(a.chain, owner)
  ];
}

/** One row per approval, in scan order. */
export function generateCsv(result: WalletScanResult): string {
  const rows = [[...CSV_HEADER], ...result.approvals.map((a) => approvalToRow(result.walletAddress, a))];
  return rows.map((r) => r.map((v) => csvEscape(v)).join(",")).join("\n") + "\n";
}
