import type { ChainId } from "../chains.js";
import { isRawAddressName } from "../registry/spenders.js";
import type { Approval } from "./types.js";

export const BATCH_REVOKE_UNLIMITED_THRESHOLD = 5;
export const MANY_APPROVALS_THRESHOLD = 20;
export const ELEVATED_RISK_SCORE = 50;
export const CHAIN_CONSOLIDATION_THRESHOLD = 10;

export function generateRecommendations(args: {
  approvals: readonly Approval[];
  criticalRisks: number;
  overallRiskScore: number;
  chains: readonly ChainId[];
}): string[] {
  const out: string[] = [];
  const { approvals } = args;

  if (args.criticalRisks > 0) {
    out.push(`URGENT: Revoke ${args.criticalRisks} critical approvals immediately`);
  }

  const unlimitedCount = approvals.filter((a) => a.isUnlimited).length;
  if (unlimitedCount > 0) {
    out.push(`You have ${unlimitedCount} unlimited approvals. Consider setting specific limits.`);
  }
  if (unlimitedCount > BATCH_REVOKE_UNLIMITED_THRESHOLD) {
    out.push("Use a batch revoke to clean up old approvals in a single transaction");
  }

  const unidentified = approvals.filter((a) => isRawAddressName(a.spenderName)).length;
  if (unidentified > 0) {
    out.push(`${unidentified} approvals are to unknown contracts. Verify these are legitimate.`);
  }

  if (approvals.length > MANY_APPROVALS_THRESHOLD) {
    out.push("You have many active approvals. Consider periodic cleanup of unused ones.");
  }

  if (args.overallRiskScore >= ELEVATED_RISK_SCORE) {
    out.push("Your wallet has elevated risk. Review all approvals carefully.");
  }

  const perChain = new Map<ChainId, number>();
  for (const a of approvals) perChain.set(a.chain, (perChain.get(a.chain) ?? 0) + 1);
  for (const chain of args.chains) {
    const count = perChain.get(chain) ?? 0;
    if (count > CHAIN_CONSOLIDATION_THRESHOLD) {
      out.push(`${count} approvals on ${chain} - consider consolidating`);
    }
  }

  return out;
}
