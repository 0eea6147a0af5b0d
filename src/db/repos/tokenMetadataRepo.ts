import { getPool } from "../pool.js";
import type { TokenMetadataRow } from "../types.js";
import { getChainInfo, type ChainId } from "../../chains.js";
import type { TokenSymbolStore } from "../../registry/symbols.js";

export type TokenMetadata = {
  chainId: number;
  tokenAddress: string;
  symbol: string | null;
  name: string | null;
  decimals: number | null;
  updatedAt: Date;
};

export async function getTokenMetadata(args: {
  chainId: number;
  tokenAddress: string;
}): Promise<TokenMetadata | null> {
  const q = await getPool().query<TokenMetadataRow>(
    "SELECT * FROM token_metadata WHERE chain_id = $1 AND token_address = $2 LIMIT 1",
    [args.chainId, args.tokenAddress.toLowerCase()]
  );
  const r = q.rows[0];
  if (!r) return null;
  return {
    chainId: r.chain_id,
    tokenAddress: r.token_address,
    symbol: r.symbol,
    name: r.name,
    decimals: r.decimals,
    updatedAt: r.updated_at
  };
}

export async function upsertTokenMetadata(args: {
  chainId: number;
  tokenAddress: string;
  symbol: string | null;
  name?: string | null;
  decimals?: number | null;
}): Promise<void> {
  await getPool().query(
    `
    INSERT INTO token_metadata (chain_id, token_address, symbol, name, decimals, updated_at)
    VALUES ($1,$2,$3,$4,$5, now())
    ON CONFLICT (chain_id, token_address) DO UPDATE
    SET symbol = COALESCE(EXCLUDED.symbol, token_metadata.symbol),
        name = COALESCE(EXCLUDED.name, token_metadata.name),
        decimals = COALESCE(EXCLUDED.decimals, token_metadata.decimals),
        updated_at = now()
    `,
    [args.chainId, args.tokenAddress.toLowerCase(), args.symbol, args.name ?? null, args.decimals ?? null]
  );
}

/** Postgres-backed symbol store for the resolver, keyed by EVM chain id. */
export const tokenSymbolStore: TokenSymbolStore = {
  async getSymbol(chain: ChainId, tokenAddress: string) {
    const meta = await getTokenMetadata({ chainId: getChainInfo(chain).chainId, tokenAddress });
    return meta?.symbol ?? null;
  },
  async saveSymbol(chain: ChainId, tokenAddress: string, symbol: string) {
    await upsertTokenMetadata({ chainId: getChainInfo(chain).chainId, tokenAddress, symbol });
  }
};
