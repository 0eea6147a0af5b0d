import type { Approval, RiskLevel, WalletScanResult } from "./types.js";

const RISK_RANK: Record<RiskLevel, number> = { critical: 0, warning: 1, safe: 2 };

/** Most urgent first; the scan result itself keeps traversal order. */
export function sortForDisplay(approvals: readonly Approval[]): Approval[] {
  return [...approvals].sort(
    (a, b) =>
      RISK_RANK[a.riskLevel] - RISK_RANK[b.riskLevel] ||
      b.riskScore - a.riskScore ||
      a.chain.localeCompare(b.chain) ||
      a.tokenAddress.localeCompare(b.tokenAddress) ||
      a.spenderAddress.localeCompare(b.spenderAddress)
  );
}

export function riskLabel(score: number): string {
  if (score >= 70) return "HIGH";
  if (score >= 30) return "MEDIUM";
  return "LOW";
}

/** Plain-text digest for chat delivery. */
export function buildTextSummary(result: WalletScanResult, topLimit = 5): string {
  const top = sortForDisplay(result.approvals)
    .filter((a) => a.riskLevel === "critical")
    .slice(0, topLimit);

  const lines: string[] = [];
  lines.push(`RISK: ${riskLabel(result.overallRiskScore)} (${result.overallRiskScore}/100)`);
  lines.push(`Active approvals: ${result.totalApprovals}`);
  lines.push(`Critical: ${result.criticalRisks}, warnings: ${result.warnings}`);
  lines.push(`Chains scanned: ${result.chainsScanned.length}`);
  if (result.degradedChains.length) {
    lines.push(`Unavailable chains: ${result.degradedChains.join(", ")}`);
  }
  lines.push("");
  if (top.length) {
    lines.push("REVOKE NOW:");
    top.forEach((a, i) => {
      lines.push(`${i + 1}) [${a.chain}] ${a.tokenSymbol} -> ${a.spenderName} (${a.allowanceHuman})`);
    });
  } else {
    lines.push("REVOKE NOW: none");
  }
  if (result.recommendations.length) {
    lines.push("");
    for (const r of result.recommendations) lines.push(`- ${r}`);
  }
  return lines.join("\n");
}
