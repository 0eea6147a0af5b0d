import type { Context } from "grammy";
import { TEXTS } from "../ui/texts.js";
import { mainKeyboard } from "../ui/keyboards.js";
import type { BotDeps } from "../deps.js";

export async function handleStart(ctx: Context, deps: BotDeps) {
  await ctx.reply(TEXTS.start(deps.service.listChains().length), { reply_markup: mainKeyboard() });
}
