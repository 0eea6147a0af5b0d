import type { ChainId } from "../chains.js";
import type { TrustTier } from "../registry/tables.js";

export type RiskLevel = "safe" | "warning" | "critical";

export type Approval = {
  chain: ChainId;
  tokenAddress: string;
  tokenSymbol: string;
  spenderAddress: string;
  spenderName: string;
  spenderTier: TrustTier;
  /** Decimal string of the raw uint256 allowance. */
  allowanceRaw: string;
  allowanceHuman: string;
  isUnlimited: boolean;
  riskLevel: RiskLevel;
  riskReasons: string[];
  /** This approval's contribution to the wallet score. */
  riskScore: number;
  /** Unix seconds at capture time. */
  lastUpdated: number;
};

/** Spenders behind critical approvals, rolled up per chain. */
export type ContractRisk = {
  address: string;
  chain: ChainId;
  name: string;
  tier: TrustTier;
  riskLevel: RiskLevel;
  approvalCount: number;
  tokens: string[];
};

export type WalletScanResult = {
  walletAddress: string;
  /** Unix seconds. */
  scanTimestamp: number;
  overallRiskScore: number;
  totalApprovals: number;
  criticalRisks: number;
  warnings: number;
  chainsScanned: ChainId[];
  /** Chains where every source that serves the chain failed; they contribute no approvals. */
  degradedChains: ChainId[];
  approvals: Approval[];
  contractRisks: ContractRisk[];
  recommendations: string[];
  runtimeMs: number;
};
