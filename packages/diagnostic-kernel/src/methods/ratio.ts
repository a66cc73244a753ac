// Gas ratio helper shared by the ratio methods.

/**
 * Stand-in for a ratio whose denominator is zero, or whose quotient overflows.
 * Larger than every upper cutoff, so bucketing resolves it to the "high" bucket.
 */
export const RATIO_SENTINEL = 99;

export function safeRatio(numerator: number, denominator: number): number {
  if (!(denominator > 0)) return RATIO_SENTINEL;
  const r = numerator / denominator;
  return Number.isFinite(r) ? r : RATIO_SENTINEL;
}
