import type { CoefficientMatrix } from './types.js';

export { mirrorMatrix, magnitudes };

/**
 * Coefficients of the horizontally flipped image, derived without a second
 * transform: flipping the columns of the input negates every odd-column
 * DCT-II coefficient. Returns a new frozen matrix; the input is untouched.
 */
function mirrorMatrix(matrix: CoefficientMatrix): CoefficientMatrix {
  return Object.freeze(
    matrix.map((row) =>
      Object.freeze(row.map((value, col) => (col % 2 === 1 ? -value : value)))
    )
  );
}

/**
 * Absolute values, used by mirrorproof hashing so that the sign flips above
 * cannot change a bit.
 */
function magnitudes(values: readonly number[]): number[] {
  return values.map((value) => Math.abs(value));
}
