import type { Bit, HashMethod } from './types.js';

export {
  mean,
  median,
  logCompress,
  computeThreshold,
  generateBitmask,
};

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Middle value; the average of the two middle values for an even count.
 */
function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Sign-preserving logarithmic compression, `sign(x) * ln(1 + |x|)`.
 * Monotonic, odd, and maps 0 to 0.
 */
function logCompress(value: number): number {
  return Math.sign(value) * Math.log1p(Math.abs(value));
}

/**
 * Threshold for the global-threshold methods. `average` and `average_x`
 * differ only in the basis the caller passes in. An empty basis gives 0.
 */
function computeThreshold(
  method: Exclude<HashMethod, 'diff'>,
  basis: readonly number[]
): number {
  switch (method) {
    case 'average':
    case 'average_x':
      return mean(basis);
    case 'median':
      return median(basis);
    case 'log':
      return mean(basis.map(logCompress));
  }
}

/**
 * Turns an ordered coefficient sequence into bits.
 *
 * Global-threshold methods compare each value with the threshold using strict
 * greater-than, so a value equal to the threshold yields 0. `diff` compares
 * each value with its predecessor and the first value with zero.
 * @param values - Selected coefficients in canonical bit order
 * @param basis - Values the threshold is computed from (unused by `diff`)
 * @param method - Bit decision rule
 */
function generateBitmask(
  values: readonly number[],
  basis: readonly number[],
  method: HashMethod
): Bit[] {
  if (method === 'diff') {
    return values.map((value, i) => {
      const previous = i === 0 ? 0 : values[i - 1];
      return value > previous ? 1 : 0;
    });
  }

  const threshold = computeThreshold(method, basis);
  if (method === 'log') {
    return values.map((value) => (logCompress(value) > threshold ? 1 : 0));
  }
  return values.map((value) => (value > threshold ? 1 : 0));
}
