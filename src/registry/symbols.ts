import { logger } from "../core/logger.js";
import { deadlineSignal } from "../core/async.js";
import { DeadlineExceededError, errorMessage } from "../core/errors.js";
import { ExpiringCache } from "../cache/expiringCache.js";
import type { ChainId } from "../chains.js";
import { SYMBOL_CALLDATA, decodeAbiString } from "../eth/erc20.js";
import type { ChainDataSource } from "../eth/sources/types.js";
import { getKnownTokenSymbol } from "./tokens.js";
import { shortAddress } from "./spenders.js";

/** Durable symbol storage behind the in-memory cache (the Postgres repo implements it). */
export interface TokenSymbolStore {
  getSymbol(chain: ChainId, tokenAddress: string): Promise<string | null>;
  saveSymbol(chain: ChainId, tokenAddress: string, symbol: string): Promise<void>;
}

export type SymbolResolverOptions = {
  source: Pick<ChainDataSource, "call">;
  cache: ExpiringCache<string>;
  callTimeoutMs: number;
  store?: TokenSymbolStore;
};

export class SymbolResolver {
  constructor(private readonly opts: SymbolResolverOptions) {}

  /**
   * Known table, then cache, then the store, then `symbol()` on chain. Falls back to
   * `0x1234...abcd` when nothing answers with a usable string.
   */
  async resolve(chain: ChainId, tokenAddress: string, signal?: AbortSignal): Promise<string> {
    const known = getKnownTokenSymbol(tokenAddress);
    if (known) return known;

    const key = `${chain}:${tokenAddress.toLowerCase()}`;
    const cached = this.opts.cache.get(key);
    if (cached !== undefined) return cached;

    const stored = await this.fromStore(chain, tokenAddress);
    if (stored) {
      this.opts.cache.set(key, stored);
      return stored;
    }

    const onChain = await this.fetchSymbol(chain, tokenAddress, signal);
    if (onChain) {
      this.opts.cache.set(key, onChain);
      if (this.opts.store) {
        await this.opts.store
          .saveSymbol(chain, tokenAddress, onChain)
          .catch((e: unknown) => logger.warn(`[${chain}] failed to persist symbol for ${tokenAddress}: ${errorMessage(e)}`));
      }
      return onChain;
    }

    return shortAddress(tokenAddress);
  }

  private async fromStore(chain: ChainId, tokenAddress: string): Promise<string | null> {
    if (!this.opts.store) return null;
    try {
      return await this.opts.store.getSymbol(chain, tokenAddress);
    } catch (e) {
      logger.warn(`[${chain}] token metadata lookup failed for ${tokenAddress}: ${errorMessage(e)}`);
      return null;
    }
  }

  private async fetchSymbol(chain: ChainId, tokenAddress: string, signal?: AbortSignal): Promise<string> {
    try {
      const result = await this.opts.source.call(
        tokenAddress,
        SYMBOL_CALLDATA,
        chain,
        deadlineSignal(this.opts.callTimeoutMs, signal)
      );
      return decodeAbiString(result);
    } catch (e) {
      // Only the caller's own deadline is fatal; a slow or failing symbol() is not.
      if (signal?.aborted) throw new DeadlineExceededError(`[${chain}] symbol lookup`);
      logger.debug(`[${chain}] symbol() failed for ${tokenAddress}: ${errorMessage(e)}`);
      return "";
    }
  }
}
