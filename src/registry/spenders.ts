import { KNOWN_SPENDERS, type TrustTier } from "./tables.js";

export type SpenderInfo = {
  name: string;
  tier: TrustTier;
};

export function shortAddress(addr: string): string {
  if (addr.length < 10) return "Unknown Contract";
  return `${addr.slice(0, 6)}...${addr.slice(-4)}`;
}

/** Unlisted spenders are "unknown" and display as a shortened address. */
export function getSpenderInfo(spenderAddress: string): SpenderInfo {
  const s = KNOWN_SPENDERS.get(spenderAddress.toLowerCase());
  if (s) return { name: s.name, tier: s.tier };
  return { name: shortAddress(spenderAddress), tier: "unknown" };
}

/** True when a display name is a raw address, i.e. the spender was never identified. */
export function isRawAddressName(name: string): boolean {
  return name.startsWith("0x") || name === "Unknown" || name === "Unknown Contract";
}
