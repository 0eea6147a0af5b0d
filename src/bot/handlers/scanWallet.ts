import type { Context } from "grammy";
import { isEthAddress, isZeroEthAddress } from "../../core/validation.js";
import { errorMessage, isEngineError } from "../../core/errors.js";
import { logger } from "../../core/logger.js";
import { writeReportFiles } from "../../reports/files.js";
import { buildTextSummary } from "../../reports/summary.js";
import { TEXTS } from "../ui/texts.js";
import { reportInlineKeyboard } from "../ui/keyboards.js";
import { clip, formatScanPreview, parseScanArgs } from "../ui/format.js";
import type { BotDeps } from "../deps.js";
import type { UserSession } from "../state.js";

/** `text` is "<wallet> [chains]", from a command or a reply to the wallet prompt. */
export async function handleWalletInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  const args = parseScanArgs(text);
  if (!isEthAddress(args.wallet)) {
    await ctx.reply(TEXTS.invalidWallet);
    return;
  }
  if (isZeroEthAddress(args.wallet)) {
    await ctx.reply(TEXTS.zeroWallet);
    return;
  }

  session.mode = "IDLE";

  const msg = await ctx.reply(`Wallet: ${args.wallet}\n\n${TEXTS.scanning}`);

  try {
    const result = await deps.service.scanWallet(args);
    const summaryText = buildTextSummary(result);

    let files: { csvPath: string | null; htmlPath: string | null } = { csvPath: null, htmlPath: null };
    try {
      files = await writeReportFiles(result, deps.reportsDir);
    } catch (e) {
      logger.warn(`failed to write report files for ${args.wallet}: ${errorMessage(e)}`);
    }

    const stored = await deps.scans.save({ result, summaryText, ...files, telegramId: ctx.from?.id });

    await ctx.api.editMessageText(chatId, msg.message_id, clip(formatScanPreview(result)), {
      reply_markup: reportInlineKeyboard(stored.id)
    });
  } catch (e) {
    logger.warn(`scan failed for ${args.wallet}: ${errorMessage(e)}`);
    const reason = isEngineError(e) ? errorMessage(e) : "upstream providers are unavailable right now";
    await ctx.api.editMessageText(chatId, msg.message_id, `Wallet: ${args.wallet}\n\nScan failed: ${reason}`);
  }
}
