import { readFileSync } from "node:fs";

export type TrustTier = "trusted" | "unknown" | "malicious";

export type KnownSpender = {
  address: string;
  name: string;
  tier: TrustTier;
};

export type KnownToken = {
  address: string;
  symbol: string;
  decimals?: number;
};

function isTrustTier(v: unknown): v is TrustTier {
  return v === "trusted" || v === "unknown" || v === "malicious";
}

function loadList(file: string, key: string): unknown[] {
  // data/ sits at the repository root, two levels above both src/registry and dist/registry.
  const raw: unknown = JSON.parse(readFileSync(new URL(`../../data/${file}`, import.meta.url), "utf8"));
  if (typeof raw !== "object" || raw === null || !(key in raw)) {
    throw new Error(`${file}: missing "${key}" list`);
  }
  const list: unknown = Reflect.get(raw, key);
  if (!Array.isArray(list)) throw new Error(`${file}: "${key}" is not a list`);
  return list;
}

function parseSpender(v: unknown): KnownSpender {
  if (
    typeof v === "object" &&
    v !== null &&
    "address" in v &&
    typeof v.address === "string" &&
    "name" in v &&
    typeof v.name === "string" &&
    "tier" in v &&
    isTrustTier(v.tier)
  ) {
    return { address: v.address.toLowerCase(), name: v.name, tier: v.tier };
  }
  throw new Error(`known-spenders.json: malformed entry ${JSON.stringify(v)}`);
}

function parseToken(v: unknown): KnownToken {
  if (typeof v === "object" && v !== null && "address" in v && typeof v.address === "string" && "symbol" in v && typeof v.symbol === "string") {
    const token: KnownToken = { address: v.address.toLowerCase(), symbol: v.symbol };
    if ("decimals" in v && typeof v.decimals === "number") token.decimals = v.decimals;
    return token;
  }
  throw new Error(`known-tokens.json: malformed entry ${JSON.stringify(v)}`);
}

function freezeMap<T extends { address: string }>(items: T[]): ReadonlyMap<string, Readonly<T>> {
  return new Map(items.map((i) => [i.address, Object.freeze(i)]));
}

// Loaded once per process; lookups are by lowercase address.
export const KNOWN_SPENDERS: ReadonlyMap<string, Readonly<KnownSpender>> = freezeMap(
  loadList("known-spenders.json", "spenders").map(parseSpender)
);

export const KNOWN_TOKENS: ReadonlyMap<string, Readonly<KnownToken>> = freezeMap(
  loadList("known-tokens.json", "tokens").map(parseToken)
);
