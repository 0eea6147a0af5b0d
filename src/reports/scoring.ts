import type { TrustTier } from "../registry/tables.js";
import { isRawAddressName } from "../registry/spenders.js";
import type { RiskLevel } from "./types.js";

export type ClassifierInput = {
  tier: TrustTier;
  isUnlimited: boolean;
  spenderName: string;
};

export type Classification = {
  riskLevel: RiskLevel;
  score: number;
  reasons: string[];
};

type TierRule = {
  base: number;
  unlimitedExtra: number;
  limitedLevel: RiskLevel;
  unlimitedLevel: RiskLevel;
  unlimitedReason: string;
};

const RULES: Readonly<Record<TrustTier, TierRule>> = {
  malicious: {
    base: 50,
    unlimitedExtra: 20,
    limitedLevel: "critical",
    unlimitedLevel: "critical",
    unlimitedReason: "Unlimited allowance to dangerous contract!"
  },
  trusted: {
    base: 2,
    unlimitedExtra: 8,
    limitedLevel: "safe",
    unlimitedLevel: "warning",
    unlimitedReason: "Unlimited allowance (consider reducing)"
  },
  unknown: {
    base: 15,
    unlimitedExtra: 15,
    limitedLevel: "warning",
    unlimitedLevel: "critical",
    unlimitedReason: "Unlimited allowance to unknown contract"
  }
};

export const UNIDENTIFIED_SPENDER_PENALTY = 10;
export const MAX_WALLET_SCORE = 100;

export function classifyApproval(input: ClassifierInput): Classification {
  const rule = RULES[input.tier];
  const reasons: string[] = [];
  let score = rule.base;

  if (input.isUnlimited) reasons.push("Unlimited approval");
  if (input.tier === "malicious") reasons.push("Known malicious contract");
  if (input.isUnlimited) {
    score += rule.unlimitedExtra;
    reasons.push(rule.unlimitedReason);
  }
  if (isRawAddressName(input.spenderName)) {
    score += UNIDENTIFIED_SPENDER_PENALTY;
    reasons.push("Unknown spender contract");
  }

  return {
    riskLevel: input.isUnlimited ? rule.unlimitedLevel : rule.limitedLevel,
    score,
    reasons
  };
}

export type RiskAggregate = {
  overallRiskScore: number;
  criticalRisks: number;
  warnings: number;
};

/** Saturating score sum; counts come from each approval's final level, once each. */
export function aggregateRisk(approvals: ReadonlyArray<{ riskLevel: RiskLevel; riskScore: number }>): RiskAggregate {
  let total = 0;
  let criticalRisks = 0;
  let warnings = 0;
  for (const a of approvals) {
    total += a.riskScore;
    if (a.riskLevel === "critical") criticalRisks++;
    else if (a.riskLevel === "warning") warnings++;
  }
  return { overallRiskScore: Math.min(MAX_WALLET_SCORE, total), criticalRisks, warnings };
}
