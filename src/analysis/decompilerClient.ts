import { bareHex, field, postJson, toBool, toNum, toStrList } from "./http.js";
import type { DecompilationSummary, Decompiler } from "./types.js";

export function parseDecompilation(json: unknown): DecompilationSummary {
  return {
    success: toBool(field(json, "success")),
    opcodes: toStrList(field(json, "opcodes")),
    functions: toStrList(field(json, "functions")),
    selectors: toStrList(field(json, "selectors")),
    isProxy: toBool(field(json, "is_proxy")),
    hasSstore: toBool(field(json, "has_sstore")),
    hasCall: toBool(field(json, "has_call")),
    complexity: toNum(field(json, "complexity")),
    warnings: toStrList(field(json, "warnings"))
  };
}

/** Client of the bytecode decompiler service (`POST /analyze`). */
export class DecompilerClient implements Decompiler {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(args: { baseUrl: string; timeoutMs: number }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = args.timeoutMs;
  }

  async decompile(bytecode: Uint8Array, signal?: AbortSignal): Promise<DecompilationSummary> {
    const json = await postJson({
      service: "decompiler",
      url: `${this.baseUrl}/analyze`,
      body: { bytecode: bareHex(bytecode) },
      timeoutMs: this.timeoutMs,
      signal
    });
    return parseDecompilation(json);
  }
}
