import type { ChainId } from "../chains.js";

export type DecompilationSummary = {
  success: boolean;
  opcodes: string[];
  functions: string[];
  selectors: string[];
  isProxy: boolean;
  hasSstore: boolean;
  hasCall: boolean;
  complexity: number;
  warnings: string[];
};

export type VulnerabilityFinding = {
  id: string;
  name: string;
  severity: string;
  description: string;
  location: string;
};

export type PatternMatch = {
  pattern: string;
  description: string;
  isMalicious: boolean;
};

export type SecurityReport = {
  riskScore: number;
  riskLevel: string;
  vulnerabilities: VulnerabilityFinding[];
  patterns: PatternMatch[];
  recommendations: string[];
};

export type ContractAnalysisResult = {
  address: string;
  chain: ChainId;
  bytecodeSize: number;
  decompilation?: DecompilationSummary;
  security?: SecurityReport;
  /** From the security report when present, else 0. */
  overallRisk: number;
  /** Unix seconds. */
  analyzedAt: number;
};

export interface Decompiler {
  decompile(bytecode: Uint8Array, signal?: AbortSignal): Promise<DecompilationSummary>;
}

export interface SecurityAnalyzer {
  analyze(input: { address: string; chain: ChainId; bytecode: Uint8Array }, signal?: AbortSignal): Promise<SecurityReport>;
}
