import ejs from "ejs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { buildRevokeLink } from "./revokeLinks.js";
import { riskLabel, sortForDisplay } from "./summary.js";
import type { Approval, WalletScanResult } from "./types.js";

const TEMPLATE_PATH = fileURLToPath(new URL("../../templates/report.ejs", import.meta.url));

export async function renderHtmlReport(args: {
  result: WalletScanResult;
  urgentLimit: number;
}): Promise<string> {
  const template = await readFile(TEMPLATE_PATH, "utf8");

  const approvals = sortForDisplay(args.result.approvals);
  const urgent: Approval[] = approvals.filter((a) => a.riskLevel === "critical").slice(0, args.urgentLimit);

  return ejs.render(
    template,
    {
      result: args.result,
      approvals,
      urgent,
      riskLabel: riskLabel(args.result.overallRiskScore),
      generatedAt: new Date(args.result.scanTimestamp * 1000).toISOString(),
      revokeLink: (a: Approval) => buildRevokeLink(a.chain, args.result.walletAddress)
    },
    { async: false }
  );
}
