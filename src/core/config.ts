import "dotenv/config";

function mustGetEnv(key: string): string {
  const v = process.env[key];
  if (!v) throw new Error(`Missing required env var: ${key}`);
  return v;
}

function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  return v ?? defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const n = Number(getEnv(key, String(defaultValue)));
  return Number.isFinite(n) ? n : defaultValue;
}

export const config = {
  botToken: getEnv("BOT_TOKEN"),
  databaseUrl: getEnv("DATABASE_URL"),
  logLevel: getEnv("LOG_LEVEL", "info"),

  // Primary provider. Chains without an Alchemy endpoint use their public RPC unless RPC_URL_<CHAIN> is set.
  alchemyApiKey: getEnv("ALCHEMY_API_KEY"),

  // Secondary provider (Etherscan v2, one endpoint for every chain id it supports)
  etherscanApiKey: getEnv("ETHERSCAN_API_KEY", ""),
  etherscanBaseUrl: getEnv("ETHERSCAN_BASE_URL", "https://api.etherscan.io/v2/api"),

  decompilerUrl: getEnv("DECOMPILER_URL", "http://localhost:3000"),
  analyzerUrl: getEnv("ANALYZER_URL", "http://localhost:5000"),

  // Free-tier explorers allow a handful of calls per second; keep chains paced.
  // "fixed" spaces chain starts by SCAN_CHAIN_DELAY_MS; "token-bucket" allows SCAN_RATE_BURST
  // starts at once, refilled at SCAN_RATE_PER_SECOND.
  scanRateLimiter: getEnv("SCAN_RATE_LIMITER", "fixed"),
  scanChainDelayMs: getNumberEnv("SCAN_CHAIN_DELAY_MS", 100),
  scanRateBurst: getNumberEnv("SCAN_RATE_BURST", 5),
  scanRatePerSecond: getNumberEnv("SCAN_RATE_PER_SECOND", 10),
  scanChainConcurrency: getNumberEnv("SCAN_CHAIN_CONCURRENCY", 1),
  batchConcurrency: getNumberEnv("BATCH_CONCURRENCY", 10),

  scanCacheTtlMs: getNumberEnv("SCAN_CACHE_TTL_MS", 5 * 60_000),
  analysisCacheTtlMs: getNumberEnv("ANALYSIS_CACHE_TTL_MS", 10 * 60_000),

  rpcTimeoutMs: getNumberEnv("RPC_TIMEOUT_MS", 60_000),
  contractCallTimeoutMs: getNumberEnv("CONTRACT_CALL_TIMEOUT_MS", 5_000),
  serviceTimeoutMs: getNumberEnv("SERVICE_TIMEOUT_MS", 60_000),
  scanTimeoutMs: getNumberEnv("SCAN_TIMEOUT_MS", 30_000),
  analyzeTimeoutMs: getNumberEnv("ANALYZE_TIMEOUT_MS", 60_000),
  batchTimeoutMs: getNumberEnv("BATCH_TIMEOUT_MS", 120_000),

  reportsStoragePath: getEnv("REPORTS_STORAGE_PATH", "./data/reports"),

  rpcUrlOverride: (chain: string): string | undefined => getEnv(`RPC_URL_${chain.toUpperCase()}`),

  // Helpers for parts that must fail fast:
  mustGetEnv
};

export type AppConfig = typeof config;
