import { getBytes, isHexString } from "ethers";
import { logger } from "../../core/logger.js";
import { deadlineSignal } from "../../core/async.js";
import type { ChainId } from "../../chains.js";
import { APPROVAL_TOPIC, topicOfAddress } from "../erc20.js";
import type { ChainDataSource, RawApprovalLog } from "./types.js";

type EtherscanEnvelope = {
  status?: string;
  message?: string;
  result: unknown;
  error?: string;
};

export type EtherscanSourceOptions = {
  apiKey: string;
  baseUrl: string;
  /** Numeric chain ids Etherscan v2 serves; chains missing here are unsupported. */
  chainIds: ReadonlyMap<ChainId, number>;
  timeoutMs: number;
};

function parseEnvelope(json: unknown): EtherscanEnvelope {
  if (typeof json !== "object" || json === null) return { result: null };
  const env: EtherscanEnvelope = { result: "result" in json ? json.result : null };
  if ("status" in json && typeof json.status === "string") env.status = json.status;
  if ("message" in json && typeof json.message === "string") env.message = json.message;
  if ("error" in json && typeof json.error === "object" && json.error !== null && "message" in json.error) {
    env.error = String(json.error.message);
  }
  return env;
}

function toRawLog(v: unknown): RawApprovalLog | null {
  if (typeof v !== "object" || v === null) return null;
  if (!("address" in v) || typeof v.address !== "string") return null;
  if (!("data" in v) || typeof v.data !== "string") return null;
  if (!("topics" in v) || !Array.isArray(v.topics)) return null;
  const topics = v.topics.filter((t): t is string => typeof t === "string");
  return { address: v.address, topics, data: v.data };
}

/** Secondary source: Etherscan v2 query-parameter API, keyed by numeric chain id. */
export class EtherscanChainSource implements ChainDataSource {
  readonly name = "etherscan";

  constructor(private readonly opts: EtherscanSourceOptions) {}

  supports(chain: ChainId): boolean {
    return this.opts.chainIds.has(chain);
  }

  private async get(chain: ChainId, params: Record<string, string>, signal?: AbortSignal): Promise<EtherscanEnvelope> {
    const chainId = this.opts.chainIds.get(chain);
    if (chainId === undefined) throw new Error(`etherscan: chain ${chain} not supported`);

    const u = new URL(this.opts.baseUrl);
    u.searchParams.set("chainid", String(chainId));
    for (const [k, v] of Object.entries(params)) u.searchParams.set(k, v);
    u.searchParams.set("apikey", this.opts.apiKey);

    const res = await fetch(u.toString(), { signal: deadlineSignal(this.opts.timeoutMs, signal) });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`Etherscan error ${res.status}: ${text}`);
    }
    return parseEnvelope(await res.json());
  }

  async fetchApprovalLogs(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<RawApprovalLog[]> {
    if (!this.supports(chain)) {
      logger.info(`[${chain}] chain not supported by Etherscan v2, skipping`);
      return [];
    }

    const env = await this.get(
      chain,
      {
        module: "logs",
        action: "getLogs",
        fromBlock: "0",
        toBlock: "latest",
        topic0: APPROVAL_TOPIC,
        topic1: topicOfAddress(wallet)
      },
      signal
    );

    // A string result ("No records found", rate-limit notices) means "nothing", not a fault.
    if (typeof env.result === "string") {
      logger.info(`[${chain}] Etherscan returned message: ${env.result}`);
      return [];
    }
    if (!Array.isArray(env.result)) {
      logger.warn(`[${chain}] Etherscan returned an unexpected result shape`);
      return [];
    }
    if (env.status !== "1" && env.message !== "No records found") {
      logger.info(`[${chain}] Etherscan status: ${env.status ?? "?"} - ${env.message ?? ""}`);
      return [];
    }

    const logs = env.result.map(toRawLog).filter((l): l is RawApprovalLog => l !== null);
    logger.info(`[${chain}] Etherscan returned ${logs.length} approval events`);
    return logs;
  }

  private async proxyHex(chain: ChainId, params: Record<string, string>, signal?: AbortSignal): Promise<string> {
    const env = await this.get(chain, { module: "proxy", ...params, tag: "latest" }, signal);
    if (env.error) throw new Error(`Etherscan ${params.action ?? "proxy"} error: ${env.error}`);
    if (typeof env.result !== "string" || !isHexString(env.result)) {
      throw new Error(`Etherscan ${params.action ?? "proxy"} returned: ${String(env.result)}`);
    }
    return env.result;
  }

  async fetchBytecode(address: string, chain: ChainId, signal?: AbortSignal): Promise<Uint8Array> {
    const code = await this.proxyHex(chain, { action: "eth_getCode", address }, signal);
    return getBytes(code);
  }

  async call(to: string, data: string, chain: ChainId, signal?: AbortSignal): Promise<string> {
    return this.proxyHex(chain, { action: "eth_call", to, data }, signal);
  }
}
