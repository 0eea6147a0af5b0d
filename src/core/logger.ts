/* eslint-disable no-console */
import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(v: string): v is LogLevel {
  return v in LEVEL_RANK;
}

const minRank = LEVEL_RANK[isLogLevel(config.logLevel) ? config.logLevel : "info"];

function ts(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= minRank;
}

export const logger = {
  debug: (msg: string, meta?: unknown) => {
    if (enabled("debug")) console.debug(`[${ts()}] [DEBUG] ${msg}`, meta ?? "");
  },
  info: (msg: string, meta?: unknown) => {
    if (enabled("info")) console.info(`[${ts()}] [INFO] ${msg}`, meta ?? "");
  },
  warn: (msg: string, meta?: unknown) => {
    if (enabled("warn")) console.warn(`[${ts()}] [WARN] ${msg}`, meta ?? "");
  },
  error: (msg: string, meta?: unknown) => {
    if (enabled("error")) console.error(`[${ts()}] [ERROR] ${msg}`, meta ?? "");
  }
};
