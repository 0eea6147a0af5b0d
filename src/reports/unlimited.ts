export const MAX_UINT256 = (1n << 256n) - 1n;

// Anything at or above half of max counts as unlimited ("max minus a bit" approvals included).
export const UNLIMITED_THRESHOLD = MAX_UINT256 / 2n;

export function isUnlimited(allowanceRaw: bigint): boolean {
  return allowanceRaw >= UNLIMITED_THRESHOLD;
}
