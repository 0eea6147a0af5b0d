import { getPool } from "../pool.js";
import type { ScanReportRow } from "../types.js";
import type { WalletScanResult } from "../../reports/types.js";

export async function createScanReport(args: {
  userId?: string;
  result: WalletScanResult;
  summaryText: string;
  csvPath?: string;
  htmlPath?: string;
}): Promise<ScanReportRow> {
  const { result } = args;
  const q = await getPool().query<ScanReportRow>(
    `
    INSERT INTO scan_reports
      (user_id, wallet_address, chains, overall_risk_score, critical_count, summary_text, csv_path, html_path, data_json)
    VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
    RETURNING *
    `,
    [
      args.userId ?? null,
      result.walletAddress.toLowerCase(),
      result.chainsScanned,
      result.overallRiskScore,
      result.criticalRisks,
      args.summaryText,
      args.csvPath ?? null,
      args.htmlPath ?? null,
      JSON.stringify(result)
    ]
  );
  const row = q.rows[0];
  if (!row) throw new Error("scan report insert returned no row");
  return row;
}

export async function getScanReportById(id: string): Promise<ScanReportRow | null> {
  const q = await getPool().query<ScanReportRow>("SELECT * FROM scan_reports WHERE id = $1 LIMIT 1", [id]);
  return q.rows[0] ?? null;
}

export async function listRecentScansByWallet(walletAddress: string, limit = 5): Promise<ScanReportRow[]> {
  const q = await getPool().query<ScanReportRow>(
    "SELECT * FROM scan_reports WHERE wallet_address = $1 ORDER BY created_at DESC LIMIT $2",
    [walletAddress.toLowerCase(), limit]
  );
  return q.rows;
}
