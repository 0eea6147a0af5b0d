import { randomUUID } from "node:crypto";
import { logger } from "../core/logger.js";
import { errorMessage } from "../core/errors.js";
import { ExpiringCache } from "../cache/expiringCache.js";
import { scanReportsRepo, usersRepo } from "../db/index.js";
import type { WalletScanResult } from "../reports/types.js";

export type StoredScan = {
  id: string;
  /** Absent once the scan has left memory and is only known from its database row. */
  result?: WalletScanResult;
  summaryText: string;
  csvPath: string | null;
  htmlPath: string | null;
};

/**
 * Scans the bot can still act on (critical list, downloads). Recent scans stay in memory;
 * with persistence on, each one also gets a `scan_reports` row and the row id becomes the scan id.
 */
export class ScanStore {
  private readonly recent: ExpiringCache<StoredScan>;

  constructor(private readonly opts: { ttlMs: number; persist: boolean; now?: () => number }) {
    this.recent = new ExpiringCache<StoredScan>(opts.ttlMs, opts.now);
  }

  async save(args: {
    result: WalletScanResult;
    summaryText: string;
    csvPath: string | null;
    htmlPath: string | null;
    telegramId?: number;
  }): Promise<StoredScan> {
    let id: string = randomUUID();

    if (this.opts.persist) {
      try {
        const user = args.telegramId === undefined ? undefined : await usersRepo.getOrCreateUserByTelegramId(args.telegramId);
        const row = await scanReportsRepo.createScanReport({
          userId: user?.id,
          result: args.result,
          summaryText: args.summaryText,
          csvPath: args.csvPath ?? undefined,
          htmlPath: args.htmlPath ?? undefined
        });
        id = row.id;
      } catch (e) {
        logger.warn(`failed to persist scan of ${args.result.walletAddress}: ${errorMessage(e)}`);
      }
    }

    const stored: StoredScan = {
      id,
      result: args.result,
      summaryText: args.summaryText,
      csvPath: args.csvPath,
      htmlPath: args.htmlPath
    };
    this.recent.set(id, stored);
    return stored;
  }

  async get(id: string): Promise<StoredScan | null> {
    const hit = this.recent.get(id);
    if (hit) return hit;
    // Row ids are bigserial; memory-only ids are UUIDs and never reach the database.
    if (!this.opts.persist || !/^\d+$/.test(id)) return null;

    const row = await scanReportsRepo.getScanReportById(id);
    if (!row) return null;
    return { id: row.id, summaryText: row.summary_text, csvPath: row.csv_path, htmlPath: row.html_path };
  }
}
