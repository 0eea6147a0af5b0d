import { Bot, type Context } from "grammy";
import { config } from "../core/config.js";
import { logger } from "../core/logger.js";
import { errorMessage } from "../core/errors.js";
import { isDatabaseEnabled } from "../db/index.js";
import { tokenSymbolStore } from "../db/repos/tokenMetadataRepo.js";
import { createRiskService } from "../service.js";
import { handleStart } from "./handlers/start.js";
import { handleHelp } from "./handlers/help.js";
import { handleChains, handleHealth } from "./handlers/info.js";
import { handleWalletInput } from "./handlers/scanWallet.js";
import { handleBatch, handleContractInput } from "./handlers/analyze.js";
import { handleHistory } from "./handlers/history.js";
import { handleDownload, handleShowCritical } from "./handlers/reportActions.js";
import { ScanStore } from "./scanStore.js";
import { BUTTONS, TEXTS } from "./ui/texts.js";
import type { BotDeps } from "./deps.js";
import type { UserSession } from "./state.js";

const token = config.botToken;
if (!token) {
  throw new Error("BOT_TOKEN is required. Create .env and set BOT_TOKEN=...");
}

const persist = isDatabaseEnabled();
const deps: BotDeps = {
  service: createRiskService({ symbolStore: persist ? tokenSymbolStore : undefined }),
  scans: new ScanStore({ ttlMs: 24 * 3600 * 1000, persist }),
  reportsDir: config.reportsStoragePath,
  historyEnabled: persist
};

const bot = new Bot(token);

const sessions = new Map<number, UserSession>();
function getSession(ctx: Context): UserSession {
  const key = ctx.chat?.id ?? ctx.from?.id ?? 0;
  const s = sessions.get(key) ?? { mode: "IDLE" };
  sessions.set(key, s);
  return s;
}

bot.command("start", (ctx) => handleStart(ctx, deps));
bot.command("help", handleHelp);
bot.command("chains", (ctx) => handleChains(ctx, deps));
bot.command("health", (ctx) => handleHealth(ctx, deps));
bot.command("history", (ctx) => handleHistory(ctx, deps, ctx.match));

bot.command("scan", async (ctx) => {
  const session = getSession(ctx);
  if (!ctx.match.trim()) {
    session.mode = "WAITING_WALLET";
    await ctx.reply(TEXTS.askWallet);
    return;
  }
  await handleWalletInput(ctx, deps, session, ctx.match);
});

bot.command("analyze", async (ctx) => {
  const session = getSession(ctx);
  if (!ctx.match.trim()) {
    session.mode = "WAITING_CONTRACT";
    await ctx.reply(TEXTS.askContract);
    return;
  }
  await handleContractInput(ctx, deps, session, ctx.match);
});

bot.command("batch", (ctx) => handleBatch(ctx, deps, ctx.match));

bot.hears(BUTTONS.help, handleHelp);
bot.hears(BUTTONS.chains, (ctx) => handleChains(ctx, deps));
bot.hears(BUTTONS.scan, async (ctx) => {
  getSession(ctx).mode = "WAITING_WALLET";
  await ctx.reply(TEXTS.askWallet);
});
bot.hears(BUTTONS.analyze, async (ctx) => {
  getSession(ctx).mode = "WAITING_CONTRACT";
  await ctx.reply(TEXTS.askContract);
});

bot.callbackQuery(/^showcrit:(.+)$/, async (ctx) => {
  await ctx.answerCallbackQuery();
  await handleShowCritical(ctx, deps, ctx.match[1] ?? "");
});

bot.callbackQuery(/^download(csv|html):(.+)$/, async (ctx) => {
  await ctx.answerCallbackQuery();
  const kind = ctx.match[1] === "html" ? "html" : "csv";
  await handleDownload(ctx, deps, ctx.match[2] ?? "", kind);
});

bot.on("message:text", async (ctx) => {
  const session = getSession(ctx);
  if (session.mode === "WAITING_WALLET") {
    await handleWalletInput(ctx, deps, session, ctx.message.text);
    return;
  }
  if (session.mode === "WAITING_CONTRACT") {
    await handleContractInput(ctx, deps, session, ctx.message.text);
  }
});

bot.catch((err) => {
  logger.error(`Bot error: ${errorMessage(err.error)}`, err.error);
});

logger.info(`Starting bot polling (persistence ${persist ? "on" : "off"})...`);
await bot.start();
