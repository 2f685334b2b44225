/**
 * Small order statistics shared by the analytics projections.
 */

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? null;
  const lo = sorted[mid - 1];
  const hi = sorted[mid];
  return lo === undefined || hi === undefined ? null : (lo + hi) / 2;
}

/**
 * Nearest-rank percentile: the value at rank ⌈p/100 · n⌉.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil((p * sorted.length) / 100));
  return sorted[rank - 1] ?? null;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population coefficient of variation (σ / μ). 0 when μ is 0.
 */
export function coefficientOfVariation(values: readonly number[]): number {
  const mu = mean(values);
  if (mu === 0) return 0;
  const variance = mean(values.map((v) => (v - mu) ** 2));
  return Math.sqrt(variance) / mu;
}

export function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Code-point order, for stable tie-breaks.
 */
export function compareText(x: string, y: string): number {
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}
