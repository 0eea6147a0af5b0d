import type { ChainId } from "../chains.js";
import { bareHex, field, postJson, toBool, toList, toNum, toStr, toStrList } from "./http.js";
import type { PatternMatch, SecurityAnalyzer, SecurityReport, VulnerabilityFinding } from "./types.js";

function toVulnerability(v: unknown): VulnerabilityFinding {
  return {
    id: toStr(field(v, "id")),
    name: toStr(field(v, "name")),
    severity: toStr(field(v, "severity")),
    description: toStr(field(v, "description")),
    location: toStr(field(v, "location"))
  };
}

function toPattern(v: unknown): PatternMatch {
  return {
    pattern: toStr(field(v, "pattern")),
    description: toStr(field(v, "description")),
    isMalicious: toBool(field(v, "is_malicious"))
  };
}

export function parseSecurityReport(json: unknown): SecurityReport {
  return {
    riskScore: toNum(field(json, "risk_score")),
    riskLevel: toStr(field(json, "risk_level")) || "unknown",
    vulnerabilities: toList(field(json, "vulnerabilities"), toVulnerability),
    patterns: toList(field(json, "patterns"), toPattern),
    recommendations: toStrList(field(json, "recommendations"))
  };
}

/** Client of the security analyzer service (`POST /api/analyze`). */
export class AnalyzerClient implements SecurityAnalyzer {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(args: { baseUrl: string; timeoutMs: number }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = args.timeoutMs;
  }

  async analyze(input: { address: string; chain: ChainId; bytecode: Uint8Array }, signal?: AbortSignal): Promise<SecurityReport> {
    const json = await postJson({
      service: "security analyzer",
      url: `${this.baseUrl}/api/analyze`,
      body: { address: input.address, chain: input.chain, bytecode: bareHex(input.bytecode) },
      timeoutMs: this.timeoutMs,
      signal
    });
    return parseSecurityReport(json);
  }
}
