import { ConfigurationError } from '../errors.js';
import type { CoefficientMatrix, LuminanceGrid } from './types.js';

export { dct1d, dct2d, NOISE_FLOOR };

/**
 * Coefficients whose magnitude is below this are flushed to exactly 0, so a
 * flat region produces zero AC terms instead of rounding noise.
 */
const NOISE_FLOOR = 1e-9;

// Cosine tables depend only on the length, so one table per length is shared
// process-wide. They hold no image data.
const cosineTables = new Map<number, number[][]>();

/**
 * Returns `table[k][n] = cos(pi * (2n + 1) * k / 2N)` for the first half of
 * the samples only; the second half follows from the symmetry
 * `cos_k(N - 1 - n) = (-1)^k cos_k(n)`.
 */
function getCosineTable(N: number): number[][] {
  let table = cosineTables.get(N);
  if (!table) {
    const half = Math.ceil(N / 2);
    table = [];
    for (let k = 0; k < N; k++) {
      const row: number[] = new Array(half);
      for (let n = 0; n < half; n++) {
        row[n] = Math.cos((Math.PI * (2 * n + 1) * k) / (2 * N));
      }
      table.push(row);
    }
    cosineTables.set(N, table);
  }
  return table;
}

function alpha(k: number, N: number): number {
  return k === 0 ? Math.sqrt(1 / N) : Math.sqrt(2 / N);
}

/**
 * Orthonormal 1D DCT-II using the even/odd decomposition.
 *
 * Pairing sample n with sample N-1-n means a reversed input produces bit-for-bit
 * the same even terms and exactly negated odd terms.
 * @param signal - Input samples
 * @returns DCT coefficients, same length as the input
 */
function dct1d(signal: readonly number[]): number[] {
  const N = signal.length;
  const table = getCosineTable(N);
  const pairs = Math.floor(N / 2);
  const middle = N % 2 === 1 ? pairs : -1;
  const result: number[] = new Array(N);

  for (let k = 0; k < N; k++) {
    const cosines = table[k];
    const odd = k % 2 === 1;
    let sum = 0;
    for (let n = 0; n < pairs; n++) {
      const a = signal[n];
      const b = signal[N - 1 - n];
      sum += (odd ? a - b : a + b) * cosines[n];
    }
    // The middle sample of an odd-length signal has a zero cosine for odd k
    if (middle >= 0 && !odd) {
      sum += signal[middle] * cosines[middle];
    }
    result[k] = alpha(k, N) * sum;
  }

  return result;
}

/**
 * 2D DCT-II: 1D DCT on every row, then on every column.
 * @param grid - Square luminance grid
 * @returns Frozen coefficient matrix with the same shape
 */
function dct2d(grid: LuminanceGrid): CoefficientMatrix {
  const N = grid.length;
  if (N === 0) {
    throw new ConfigurationError('Cannot transform an empty grid');
  }
  for (const row of grid) {
    if (row.length !== N) {
      throw new ConfigurationError(
        `Grid must be square: expected rows of ${N} samples, got ${row.length}`
      );
    }
  }

  const rowTransformed = grid.map((row) => dct1d(row));

  const result: number[][] = Array.from({ length: N }, () =>
    new Array<number>(N).fill(0)
  );
  for (let col = 0; col < N; col++) {
    const column: number[] = [];
    for (let row = 0; row < N; row++) {
      column.push(rowTransformed[row][col]);
    }
    const transformed = dct1d(column);
    for (let row = 0; row < N; row++) {
      const value = transformed[row];
      result[row][col] = Math.abs(value) < NOISE_FLOOR ? 0 : value;
    }
  }

  return Object.freeze(result.map((row) => Object.freeze(row)));
}
