import { getChainInfo, type ChainId } from "../chains.js";

// revoke.cash has no deep link to a single (token, spender) pair; the CSV carries both for copy/paste.
export function buildRevokeLink(chain: ChainId, owner: string): string {
  return `https://revoke.cash/address/${owner}?chainId=${getChainInfo(chain).chainId}`;
}
