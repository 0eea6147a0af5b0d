import type { ChainInfo } from "../../chains.js";
import type { BatchItem, BatchReport } from "../../analysis/batch.js";
import type { ContractAnalysisResult } from "../../analysis/types.js";
import { buildRevokeLink } from "../../reports/revokeLinks.js";
import { buildTextSummary, sortForDisplay } from "../../reports/summary.js";
import type { WalletScanResult } from "../../reports/types.js";
import type { HealthReport } from "../../service.js";

function splitArgs(text: string): string[] {
  return text
    .trim()
    .split(/\s+/)
    .filter((s) => s !== "");
}

/** "0xabc… ethereum,base" or "0xabc… ethereum base" */
export function parseScanArgs(text: string): { wallet: string; chains?: string } {
  const [wallet = "", ...rest] = splitArgs(text);
  const chains = rest.join(",");
  return chains ? { wallet, chains } : { wallet };
}

export function parseAnalyzeArgs(text: string): { address: string; chain?: string } {
  const [address = "", chain] = splitArgs(text);
  return chain ? { address, chain } : { address };
}

/** Whitespace- or comma-separated `address[:chain]` items. */
export function parseBatchArgs(text: string): BatchItem[] {
  return text
    .split(/[\s,]+/)
    .filter((s) => s !== "")
    .map((token) => {
      const [address = "", chain] = token.split(":");
      return chain ? { address, chain } : { address };
    });
}

export function formatScanPreview(result: WalletScanResult): string {
  return `Wallet: ${result.walletAddress}\n\n${buildTextSummary(result)}`;
}

export function formatCriticalList(result: WalletScanResult, limit = 20): string {
  const items = sortForDisplay(result.approvals)
    .filter((a) => a.riskLevel === "critical")
    .slice(0, limit);
  if (!items.length) return "";

  return items
    .map(
      (a, i) =>
        `${i + 1}) [${a.chain}] ${a.tokenSymbol} -> ${a.spenderName} (${a.spenderAddress})\n` +
        `${a.riskReasons.join("; ")}\n` +
        `Revoke: ${buildRevokeLink(a.chain, result.walletAddress)}`
    )
    .join("\n\n");
}

export function formatAnalysis(r: ContractAnalysisResult): string {
  const lines = [`Contract: ${r.address} (${r.chain})`, `Bytecode: ${r.bytecodeSize} bytes`];

  if (r.security) {
    lines.push(`Risk score: ${r.overallRisk}/100 (${r.security.riskLevel})`);
    if (r.security.vulnerabilities.length) {
      lines.push("Vulnerabilities:");
      for (const v of r.security.vulnerabilities) lines.push(`- [${v.severity}] ${v.name}: ${v.description}`);
    }
    const malicious = r.security.patterns.filter((p) => p.isMalicious);
    if (malicious.length) {
      lines.push("Malicious patterns:");
      for (const p of malicious) lines.push(`- ${p.pattern}: ${p.description}`);
    }
    for (const rec of r.security.recommendations) lines.push(`* ${rec}`);
  } else {
    lines.push("Security analyzer: unavailable");
  }

  if (r.decompilation) {
    const d = r.decompilation;
    lines.push(
      `Functions: ${d.functions.length}, selectors: ${d.selectors.length}, complexity: ${d.complexity}`,
      `Proxy: ${d.isProxy ? "yes" : "no"}, writes storage: ${d.hasSstore ? "yes" : "no"}, external calls: ${d.hasCall ? "yes" : "no"}`
    );
    for (const w of d.warnings) lines.push(`! ${w}`);
  } else {
    lines.push("Decompiler: unavailable");
  }

  return lines.join("\n");
}

export function formatBatchReport(report: BatchReport): string {
  const lines = [`Analyzed ${report.success}/${report.total} contracts`];
  for (const r of report.results) {
    lines.push(`✅ ${r.address} (${r.chain}): risk ${r.overallRisk}/100`);
  }
  for (const e of report.errors) {
    lines.push(`❌ ${e.address} (${e.chain}): ${e.error}`);
  }
  return lines.join("\n");
}

export function formatChains(chains: readonly ChainInfo[]): string {
  return ["Supported networks:", ...chains.map((c) => `- ${c.id}: ${c.name} (chain id ${c.chainId})`)].join("\n");
}

export function formatHealth(h: HealthReport): string {
  return [
    `${h.service} v${h.version}: ${h.status}`,
    `Chains: ${h.chains}`,
    `Decompiler: ${h.services.decompiler}`,
    `Analyzer: ${h.services.analyzer}`
  ].join("\n");
}

const TELEGRAM_TEXT_LIMIT = 4096;

export function clip(text: string, limit = TELEGRAM_TEXT_LIMIT): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit - 2)}\n…`;
}
