import { InputFile, type Context } from "grammy";
import { fileExists } from "../../core/fs.js";
import { TEXTS } from "../ui/texts.js";
import { clip, formatCriticalList } from "../ui/format.js";
import type { BotDeps } from "../deps.js";

export async function handleShowCritical(ctx: Context, deps: BotDeps, scanId: string) {
  const stored = await deps.scans.get(scanId);
  if (!stored) {
    await ctx.reply(TEXTS.reportExpired);
    return;
  }
  // Rows loaded back from the database carry only the summary.
  if (!stored.result) {
    await ctx.reply(clip(stored.summaryText));
    return;
  }
  const text = formatCriticalList(stored.result);
  await ctx.reply(text ? clip(text) : TEXTS.noCritical);
}

export async function handleDownload(ctx: Context, deps: BotDeps, scanId: string, kind: "csv" | "html") {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  const stored = await deps.scans.get(scanId);
  const path = kind === "csv" ? stored?.csvPath : stored?.htmlPath;
  // Report files can be cleaned from disk while the scan row survives.
  if (!path || !(await fileExists(path))) {
    await ctx.reply(TEXTS.reportExpired);
    return;
  }
  await ctx.api.sendDocument(chatId, new InputFile(path, `approvals-report.${kind}`));
}
