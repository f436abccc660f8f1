import { describe, it } from 'node:test';
import assert from 'node:assert';
import { dct1d, dct2d, NOISE_FLOOR } from '../helpers/dct.js';
import { ConfigurationError } from '../errors.js';
import { constantGrid, flipHorizontal, patternGrid } from './gridFixtures.js';

// Straight from the definition, no symmetry tricks
function naiveDct(signal: number[]): number[] {
  const N = signal.length;
  return signal.map((_, k) => {
    let sum = 0;
    for (let n = 0; n < N; n++) {
      sum += signal[n] * Math.cos((Math.PI * (2 * n + 1) * k) / (2 * N));
    }
    return (k === 0 ? Math.sqrt(1 / N) : Math.sqrt(2 / N)) * sum;
  });
}

describe('DCT-II', () => {
  describe('dct1d', () => {
    it('should match the textbook definition for even and odd lengths', () => {
      for (const signal of [
        [1, 2, 3, 4],
        [8, -3, 0, 5, 7, 1, 2, 9],
        [4, 1, 7, 3, 2],
      ]) {
        const fast = dct1d(signal);
        const reference = naiveDct(signal);
        assert.strictEqual(fast.length, signal.length);
        fast.forEach((value, k) => {
          assert.ok(
            Math.abs(value - reference[k]) < 1e-9,
            `coefficient ${k}: ${value} vs ${reference[k]}`
          );
        });
      }
    });

    it('should negate exactly the odd coefficients of a reversed signal', () => {
      const signal = [3, 141, 59, 26, 53, 58, 97];
      const forward = dct1d(signal);
      const reversed = dct1d([...signal].reverse());
      forward.forEach((value, k) => {
        const expected = k % 2 === 1 ? -value : value;
        assert.ok(reversed[k] === expected, `coefficient ${k}`);
      });
      console.log('✓ Reversal negates odd coefficients exactly');
    });
  });

  describe('dct2d', () => {
    it('should put all the energy of a flat grid into the DC term', () => {
      const matrix = dct2d(constantGrid(4, 10));

      // DC of an orthonormal transform is N * mean
      assert.ok(Math.abs(matrix[0][0] - 40) < 1e-12);
      for (let row = 0; row < 4; row++) {
        for (let col = 0; col < 4; col++) {
          if (row === 0 && col === 0) continue;
          assert.strictEqual(Math.abs(matrix[row][col]), 0);
        }
      }
    });

    it('should compute the 2x2 transform in closed form', () => {
      const matrix = dct2d([
        [12, 2],
        [6, 0],
      ]);
      const expected = [
        [10, 8],
        [4, 2],
      ];
      for (let row = 0; row < 2; row++) {
        for (let col = 0; col < 2; col++) {
          assert.ok(Math.abs(matrix[row][col] - expected[row][col]) < 1e-12);
        }
      }
    });

    it('should preserve energy', () => {
      const grid = patternGrid(16, 7);
      const matrix = dct2d(grid);
      const energy = (values: readonly (readonly number[])[]) =>
        values.reduce((sum, row) => sum + row.reduce((s, v) => s + v * v, 0), 0);
      const ratio = energy(matrix) / energy(grid);
      assert.ok(Math.abs(ratio - 1) < 1e-9, `energy ratio ${ratio}`);
    });

    it('should give a flipped grid exactly the odd-column-negated coefficients', () => {
      for (const size of [8, 9, 32]) {
        const grid = patternGrid(size, size);
        const original = dct2d(grid);
        const flipped = dct2d(flipHorizontal(grid));
        for (let row = 0; row < size; row++) {
          for (let col = 0; col < size; col++) {
            const expected = col % 2 === 1 ? -original[row][col] : original[row][col];
            assert.ok(
              flipped[row][col] === expected,
              `size ${size} at [${row}][${col}]`
            );
          }
        }
      }
    });

    it('should flush rounding noise below the noise floor to zero', () => {
      const matrix = dct2d(constantGrid(32, 200));
      const nonZero = matrix.flat().filter((value) => value !== 0);
      assert.deepStrictEqual(nonZero.length, 1);
      assert.ok(NOISE_FLOOR > 0);
    });

    it('should return a frozen matrix', () => {
      const matrix = dct2d(patternGrid(4));
      assert.ok(Object.isFrozen(matrix));
      assert.ok(Object.isFrozen(matrix[0]));
    });

    it('should reject empty and non-square grids', () => {
      assert.throws(() => dct2d([]), ConfigurationError);
      assert.throws(
        () =>
          dct2d([
            [1, 2, 3],
            [4, 5, 6],
          ]),
        ConfigurationError
      );
    });
  });
});
