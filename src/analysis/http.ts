import { hexlify } from "ethers";
import { logger } from "../core/logger.js";
import { deadlineSignal } from "../core/async.js";
import { EngineError } from "../core/errors.js";

/** Both services take bytecode as bare hex, no 0x prefix. */
export function bareHex(bytes: Uint8Array): string {
  return hexlify(bytes).slice(2);
}

export function field(obj: unknown, key: string): unknown {
  if (typeof obj !== "object" || obj === null) return undefined;
  return Reflect.get(obj, key);
}

export function toStr(v: unknown): string {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return "";
}

export function toNum(v: unknown): number {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function toBool(v: unknown): boolean {
  return v === true || v === "true";
}

export function toStrList(v: unknown): string[] {
  if (!Array.isArray(v)) return [];
  return v.map(toStr).filter((s) => s !== "");
}

export function toList<T>(v: unknown, map: (item: unknown) => T): T[] {
  return Array.isArray(v) ? v.map(map) : [];
}

/** POSTs JSON and returns the parsed body; non-2xx and unparsable bodies throw UPSTREAM. */
export async function postJson(args: {
  service: string;
  url: string;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<unknown> {
  const resp = await fetch(args.url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(args.body),
    signal: deadlineSignal(args.timeoutMs, args.signal)
  });

  const text = await resp.text();
  if (!resp.ok) {
    logger.warn(`${args.service} error ${resp.status} ${resp.statusText}: ${text.slice(0, 2000)}`);
    throw new EngineError("UPSTREAM", `${args.service} returned status ${resp.status}: ${text.slice(0, 500)}`);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new EngineError("UPSTREAM", `${args.service} returned invalid JSON`, { cause: e });
  }
}
