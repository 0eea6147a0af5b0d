import type { Context } from "grammy";
import { isEthAddress } from "../../core/validation.js";
import { scanReportsRepo } from "../../db/index.js";
import { TEXTS } from "../ui/texts.js";
import type { BotDeps } from "../deps.js";

export async function handleHistory(ctx: Context, deps: BotDeps, text: string) {
  if (!deps.historyEnabled) {
    await ctx.reply(TEXTS.historyDisabled);
    return;
  }
  const wallet = text.trim();
  if (!isEthAddress(wallet)) {
    await ctx.reply(TEXTS.invalidWallet);
    return;
  }

  const rows = await scanReportsRepo.listRecentScansByWallet(wallet);
  if (!rows.length) {
    await ctx.reply(TEXTS.noHistory);
    return;
  }
  const lines = rows.map(
    (r) => `#${r.id} ${r.created_at.toISOString().slice(0, 16).replace("T", " ")}: score ${r.overall_risk_score}/100, critical ${r.critical_count}`
  );
  await ctx.reply([`Recent scans of ${wallet}:`, ...lines].join("\n"));
}
