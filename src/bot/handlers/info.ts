import type { Context } from "grammy";
import type { BotDeps } from "../deps.js";
import { formatChains, formatHealth } from "../ui/format.js";

export async function handleChains(ctx: Context, deps: BotDeps) {
  await ctx.reply(formatChains(deps.service.listChains()));
}

export async function handleHealth(ctx: Context, deps: BotDeps) {
  await ctx.reply(formatHealth(deps.service.health()));
}
