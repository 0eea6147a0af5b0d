import { join } from "node:path";
import { writeFileEnsured } from "../core/fs.js";
import { generateCsv } from "./csv.js";
import { renderHtmlReport } from "./html.js";
import type { WalletScanResult } from "./types.js";

export type ReportFiles = {
  csvPath: string;
  htmlPath: string;
};

/** Writes `<wallet>-<timestamp>.csv` and `.html` under `dir`. */
export async function writeReportFiles(result: WalletScanResult, dir: string, urgentLimit = 10): Promise<ReportFiles> {
  const base = `${result.walletAddress.toLowerCase()}-${result.scanTimestamp}`;
  const csvPath = join(dir, `${base}.csv`);
  const htmlPath = join(dir, `${base}.html`);

  await writeFileEnsured(csvPath, generateCsv(result));
  await writeFileEnsured(htmlPath, await renderHtmlReport({ result, urgentLimit }));
  return { csvPath, htmlPath };
}
