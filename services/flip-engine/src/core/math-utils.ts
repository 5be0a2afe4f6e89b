// Ratio that degrades to NaN instead of dividing by a non-positive denominator
export function ratioOrNaN(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : Number.NaN;
}

// Ratio used to re-derive a rate; a zero base means the rate contributed nothing
export function rateOrZero(amount: number, base: number): number {
  return base > 0 ? amount / base : 0;
}

export function isPositiveFinite(value: number | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Relative difference between two values, using the larger magnitude as scale.
 * Returns 0 when both are 0.
 */
export function relativeDifference(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  if (scale === 0) {
    return 0;
  }
  return Math.abs(a - b) / scale;
}
