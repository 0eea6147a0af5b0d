import { ALL_CHAINS, isChainId, type ChainId } from "../chains.js";
import { EngineError } from "./errors.js";

export function isEthAddress(addr: string): boolean {
  return /^0x[a-fA-F0-9]{40}$/.test(addr);
}

export function isZeroEthAddress(addr: string): boolean {
  return /^0x0{40}$/i.test(addr);
}

export function assertEthAddress(addr: string, what = "address"): string {
  const a = addr.trim();
  if (!isEthAddress(a)) {
    throw new EngineError("INVALID_INPUT", `invalid ${what} format: ${addr}`);
  }
  return a;
}

export function parseChain(raw: string | undefined | null): ChainId {
  const v = raw?.trim().toLowerCase() ?? "";
  if (!v) return "ethereum";
  if (!isChainId(v)) throw new EngineError("UNSUPPORTED_CHAIN", `unsupported chain: ${raw}`);
  return v;
}

/**
 * Comma-separated chain names, case-insensitive. Duplicates collapse; any unknown name
 * rejects the whole list. `undefined`/empty input means every supported chain.
 */
export function parseChainList(raw: string | readonly string[] | undefined | null): ChainId[] {
  if (raw === undefined || raw === null) return [...ALL_CHAINS];
  const parts = typeof raw === "string" ? raw.split(",") : raw;
  if (typeof raw === "string" && !raw.trim()) return [...ALL_CHAINS];

  const selected: ChainId[] = [];
  const invalid: string[] = [];
  for (const p of parts) {
    const trimmed = p.trim();
    if (!trimmed) continue;
    const id = trimmed.toLowerCase();
    if (!isChainId(id)) {
      invalid.push(trimmed);
      continue;
    }
    if (!selected.includes(id)) selected.push(id);
  }

  if (invalid.length) throw new EngineError("UNSUPPORTED_CHAIN", `unsupported chains: ${invalid.join(", ")}`);
  if (!selected.length) throw new EngineError("INVALID_INPUT", "no valid chains provided");
  return selected;
}
