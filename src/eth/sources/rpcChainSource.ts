import { getBytes } from "ethers";
import { logger } from "../../core/logger.js";
import { withDeadline } from "../../core/async.js";
import { EngineError } from "../../core/errors.js";
import type { ChainId } from "../../chains.js";
import { APPROVAL_TOPIC, topicOfAddress } from "../erc20.js";
import type { ChainDataSource, RawApprovalLog, RpcClient } from "./types.js";

/** Primary source: JSON-RPC `eth_getLogs` / `eth_getCode` / `eth_call` per chain. */
export class RpcChainSource implements ChainDataSource {
  readonly name = "rpc";

  constructor(private readonly clients: ReadonlyMap<ChainId, RpcClient>) {}

  supports(chain: ChainId): boolean {
    return this.clients.has(chain);
  }

  private client(chain: ChainId): RpcClient {
    const c = this.clients.get(chain);
    if (!c) throw new EngineError("UNSUPPORTED_CHAIN", `rpc: no provider for ${chain}`);
    return c;
  }

  async fetchApprovalLogs(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<RawApprovalLog[]> {
    const provider = this.client(chain);
    logger.info(`[${chain}] eth_getLogs Approval(owner=${wallet}) blocks 0..latest`);

    const logs = await withDeadline(
      provider.getLogs({ fromBlock: 0, toBlock: "latest", topics: [APPROVAL_TOPIC, topicOfAddress(wallet)] }),
      signal,
      `[${chain}] eth_getLogs`
    );

    logger.info(`[${chain}] rpc returned ${logs.length} approval events`);
    return logs.map((log) => ({ address: log.address, topics: [...log.topics], data: log.data }));
  }

  async fetchBytecode(address: string, chain: ChainId, signal?: AbortSignal): Promise<Uint8Array> {
    const provider = this.client(chain);
    const code = await withDeadline(provider.getCode(address), signal, `[${chain}] eth_getCode`);
    return getBytes(code);
  }

  async call(to: string, data: string, chain: ChainId, signal?: AbortSignal): Promise<string> {
    const provider = this.client(chain);
    return withDeadline(provider.call({ to, data }), signal, `[${chain}] eth_call`);
  }
}
