export const BASIS_POINTS = 10000n;
export const MAX_FEE_PERCENT_BASIS_POINTS = 10000;

export interface FeeQuote {
  platformFee: bigint;
  sellerAmount: bigint;
}

/** platformFee = max(price * bps / 10000, minimumFee), floor division. */
export function quotePlatformFee(
  price: bigint,
  feePercentBasisPoints: number,
  minimumFee: bigint,
): FeeQuote {
  const proportional = (price * BigInt(feePercentBasisPoints)) / BASIS_POINTS;
  const platformFee = proportional > minimumFee ? proportional : minimumFee;
  return { platformFee, sellerAmount: price - platformFee };
}

export function isFeePercent(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_FEE_PERCENT_BASIS_POINTS
  );
}

export function parseAmount(value: unknown): bigint | null {
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  return BigInt(value);
}

export function formatAmount(value: bigint): string {
  return value.toString(10);
}
