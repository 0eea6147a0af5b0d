import type { Context } from "grammy";
import { errorMessage, isEngineError } from "../../core/errors.js";
import { logger } from "../../core/logger.js";
import { TEXTS } from "../ui/texts.js";
import { clip, formatAnalysis, formatBatchReport, parseAnalyzeArgs, parseBatchArgs } from "../ui/format.js";
import type { BotDeps } from "../deps.js";
import type { UserSession } from "../state.js";

function userFacingError(e: unknown): string {
  return isEngineError(e) ? errorMessage(e) : "analysis services are unavailable right now";
}

export async function handleContractInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  session.mode = "IDLE";
  const args = parseAnalyzeArgs(text);
  const msg = await ctx.reply(TEXTS.analyzing);

  try {
    const result = await deps.service.analyzeContract(args);
    await ctx.api.editMessageText(chatId, msg.message_id, clip(formatAnalysis(result)));
  } catch (e) {
    logger.warn(`analysis failed for ${args.address}: ${errorMessage(e)}`);
    await ctx.api.editMessageText(chatId, msg.message_id, `Analysis failed: ${userFacingError(e)}`);
  }
}

export async function handleBatch(ctx: Context, deps: BotDeps, text: string) {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  const items = parseBatchArgs(text);
  const msg = await ctx.reply(`Analyzing ${items.length} contracts…`);

  try {
    const report = await deps.service.analyzeBatch(items);
    await ctx.api.editMessageText(chatId, msg.message_id, clip(formatBatchReport(report)));
  } catch (e) {
    logger.warn(`batch analysis failed: ${errorMessage(e)}`);
    await ctx.api.editMessageText(chatId, msg.message_id, `Batch failed: ${userFacingError(e)}`);
  }
}
