import { logger } from "./core/logger.js";
import { config } from "./core/config.js";
import { deadlineSignal, withDeadline } from "./core/async.js";
import { EngineError } from "./core/errors.js";
import { createRateLimiter, type RateLimiter } from "./core/rateLimiter.js";
import { assertEthAddress, parseChain, parseChainList } from "./core/validation.js";
import { ExpiringCache } from "./cache/expiringCache.js";
import { ALL_CHAINS, listChains, type ChainId, type ChainInfo } from "./chains.js";
import { getAllChainProviders } from "./eth/provider.js";
import { RpcChainSource } from "./eth/sources/rpcChainSource.js";
import { EtherscanChainSource } from "./eth/sources/etherscanChainSource.js";
import { FallbackChainSource } from "./eth/sources/fallbackChainSource.js";
import type { ApprovalLogsResult, ChainDataSource } from "./eth/sources/types.js";
import { SymbolResolver, type TokenSymbolStore } from "./registry/symbols.js";
import { ApprovalScanner } from "./reports/engine.js";
import type { WalletScanResult } from "./reports/types.js";
import { ContractAnalyzer } from "./analysis/pipeline.js";
import { analyzeBatch, assertBatchSize, type BatchItem, type BatchReport } from "./analysis/batch.js";
import { DecompilerClient } from "./analysis/decompilerClient.js";
import { AnalyzerClient } from "./analysis/analyzerClient.js";
import type { ContractAnalysisResult, Decompiler, SecurityAnalyzer } from "./analysis/types.js";

export const SERVICE_NAME = "approval-risk-engine";
export const SERVICE_VERSION = "0.1.0";

export type ServiceSettings = {
  scanRateLimiter: string;
  scanChainDelayMs: number;
  scanRateBurst: number;
  scanRatePerSecond: number;
  scanChainConcurrency: number;
  batchConcurrency: number;
  scanCacheTtlMs: number;
  analysisCacheTtlMs: number;
  contractCallTimeoutMs: number;
  scanTimeoutMs: number;
  analyzeTimeoutMs: number;
  batchTimeoutMs: number;
  decompilerUrl: string;
  analyzerUrl: string;
};

/** A data source that also reports which provider answered an approval query. */
export type ApprovalDataSource = ChainDataSource & {
  fetchApprovals(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<ApprovalLogsResult>;
};

export type RiskServiceDeps = {
  source?: ApprovalDataSource;
  decompiler?: Decompiler;
  analyzer?: SecurityAnalyzer;
  symbolStore?: TokenSymbolStore;
  rateLimiter?: RateLimiter;
  settings?: Partial<ServiceSettings>;
  now?: () => number;
};

export type HealthReport = {
  status: "healthy";
  service: string;
  version: string;
  chains: number;
  operations: string[];
  services: { decompiler: string; analyzer: string };
};

export type CallOptions = { signal?: AbortSignal };

export type RiskService = {
  scanWallet(input: { wallet: string; chains?: string | readonly string[] }, opts?: CallOptions): Promise<WalletScanResult>;
  analyzeContract(input: { address: string; chain?: string }, opts?: CallOptions): Promise<ContractAnalysisResult>;
  analyzeBatch(items: readonly BatchItem[], opts?: CallOptions): Promise<BatchReport>;
  listChains(): ChainInfo[];
  health(): HealthReport;
};

function defaultSettings(): ServiceSettings {
  return {
    scanRateLimiter: config.scanRateLimiter,
    scanChainDelayMs: config.scanChainDelayMs,
    scanRateBurst: config.scanRateBurst,
    scanRatePerSecond: config.scanRatePerSecond,
    scanChainConcurrency: config.scanChainConcurrency,
    batchConcurrency: config.batchConcurrency,
    scanCacheTtlMs: config.scanCacheTtlMs,
    analysisCacheTtlMs: config.analysisCacheTtlMs,
    contractCallTimeoutMs: config.contractCallTimeoutMs,
    scanTimeoutMs: config.scanTimeoutMs,
    analyzeTimeoutMs: config.analyzeTimeoutMs,
    batchTimeoutMs: config.batchTimeoutMs,
    decompilerUrl: config.decompilerUrl,
    analyzerUrl: config.analyzerUrl
  };
}

/** JSON-RPC first, Etherscan v2 second (when an API key is configured). */
export function createDefaultSource(): FallbackChainSource {
  const sources: ChainDataSource[] = [new RpcChainSource(getAllChainProviders())];
  if (config.etherscanApiKey) {
    sources.push(
      new EtherscanChainSource({
        apiKey: config.etherscanApiKey,
        baseUrl: config.etherscanBaseUrl,
        chainIds: new Map(listChains().filter((c) => c.etherscanV2).map((c) => [c.id, c.chainId])),
        timeoutMs: config.rpcTimeoutMs
      })
    );
  } else {
    logger.info("ETHERSCAN_API_KEY not set, JSON-RPC is the only approval source");
  }
  return new FallbackChainSource(sources);
}

/**
 * Wires sources, caches and service clients into the operations the presentation layer
 * calls. Inputs are validated before any network call; each operation runs under its
 * own deadline, combined with the caller's signal when one is given.
 */
export function createRiskService(deps: RiskServiceDeps = {}): RiskService {
  const settings: ServiceSettings = { ...defaultSettings(), ...deps.settings };
  const now = deps.now ?? Date.now;
  const source = deps.source ?? createDefaultSource();

  const symbols = new SymbolResolver({
    source,
    cache: new ExpiringCache<string>(settings.scanCacheTtlMs, now),
    callTimeoutMs: settings.contractCallTimeoutMs,
    store: deps.symbolStore
  });

  const scanner = new ApprovalScanner({
    source,
    symbols,
    rateLimiter:
      deps.rateLimiter ??
      createRateLimiter({
        kind: settings.scanRateLimiter,
        intervalMs: settings.scanChainDelayMs,
        burst: settings.scanRateBurst,
        perSecond: settings.scanRatePerSecond
      }),
    chainConcurrency: settings.scanChainConcurrency,
    now
  });

  const analyzer = new ContractAnalyzer({
    source,
    decompiler: deps.decompiler ?? new DecompilerClient({ baseUrl: settings.decompilerUrl, timeoutMs: config.serviceTimeoutMs }),
    analyzer: deps.analyzer ?? new AnalyzerClient({ baseUrl: settings.analyzerUrl, timeoutMs: config.serviceTimeoutMs }),
    cache: new ExpiringCache<ContractAnalysisResult>(settings.analysisCacheTtlMs, now),
    now
  });

  return {
    async scanWallet(input, opts = {}) {
      if (!input.wallet.trim()) throw new EngineError("INVALID_INPUT", "wallet address required");
      const wallet = assertEthAddress(input.wallet, "wallet address");
      const chains = parseChainList(input.chains);

      const signal = deadlineSignal(settings.scanTimeoutMs, opts.signal);
      logger.info(`scanning ${wallet} on ${chains.length} chains`);
      return withDeadline(scanner.scanWallet(wallet, chains, { signal }), signal, "wallet scan");
    },

    async analyzeContract(input, opts = {}) {
      if (!input.address.trim()) throw new EngineError("INVALID_INPUT", "contract address required");
      const address = assertEthAddress(input.address, "contract address");
      const chain = parseChain(input.chain);

      const signal = deadlineSignal(settings.analyzeTimeoutMs, opts.signal);
      return withDeadline(analyzer.analyze(address, chain, { signal }), signal, "contract analysis");
    },

    async analyzeBatch(items, opts = {}) {
      assertBatchSize(items.length);
      // Per-item deadline; items that finished before it fires stay in the report.
      const signal = deadlineSignal(settings.batchTimeoutMs, opts.signal);
      return analyzeBatch(analyzer, items, { concurrency: settings.batchConcurrency, signal });
    },

    listChains() {
      return listChains();
    },

    health() {
      return {
        status: "healthy",
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        chains: ALL_CHAINS.length,
        operations: ["scanWallet", "analyzeContract", "analyzeBatch", "listChains", "health"],
        services: { decompiler: settings.decompilerUrl, analyzer: settings.analyzerUrl }
      };
    }
  };
}
