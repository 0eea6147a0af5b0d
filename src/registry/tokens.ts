import { KNOWN_TOKENS } from "./tables.js";

export const DEFAULT_TOKEN_DECIMALS = 18;

export function getKnownTokenSymbol(tokenAddress: string): string | null {
  return KNOWN_TOKENS.get(tokenAddress.toLowerCase())?.symbol ?? null;
}

/** Only non-standard tokens (6 or 8 decimals) are tabulated; everything else is 18. */
export function getTokenDecimals(tokenAddress: string): number {
  return KNOWN_TOKENS.get(tokenAddress.toLowerCase())?.decimals ?? DEFAULT_TOKEN_DECIMALS;
}
