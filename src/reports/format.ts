import { isUnlimited } from "./unlimited.js";

export function formatUnitsSafe(value: bigint, decimals: number | null): string {
  if (decimals === null) return value.toString();
  if (decimals === 0) return value.toString();

  const base = 10n ** BigInt(decimals);
  const whole = value / base;
  const frac = value % base;

  const fracStr = frac.toString().padStart(decimals, "0").replace(/0+$/, "");
  return fracStr ? `${whole.toString()}.${fracStr}` : whole.toString();
}

const SCALES: ReadonlyArray<readonly [bigint, string]> = [
  [1_000_000_000n, "B"],
  [1_000_000n, "M"],
  [1_000n, "K"]
];

// value / divisor rounded half-up to two decimals
function fixed2(value: bigint, divisor: bigint): string {
  const hundredths = (value * 200n + divisor) / (2n * divisor);
  return `${hundredths / 100n}.${(hundredths % 100n).toString().padStart(2, "0")}`;
}

/** "UNLIMITED", or a two-decimal magnitude with K/M/B suffix ("500.00", "1.25M"). */
export function formatAllowance(value: bigint, decimals: number): string {
  if (isUnlimited(value)) return "UNLIMITED";

  const base = 10n ** BigInt(decimals);
  for (const [scale, suffix] of SCALES) {
    if (value >= base * scale) return fixed2(value, base * scale) + suffix;
  }
  return fixed2(value, base);
}
