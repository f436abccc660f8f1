import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  computeThreshold,
  generateBitmask,
  logCompress,
  mean,
  median,
} from '../helpers/bitmask.js';

describe('Bitmask generation', () => {
  describe('statistics', () => {
    it('should compute the arithmetic mean', () => {
      assert.strictEqual(mean([3, -1, 2, 0]), 1);
      assert.strictEqual(mean([]), 0);
    });

    it('should take the middle value for odd counts', () => {
      assert.strictEqual(median([3, 1, 2]), 2);
    });

    it('should average the two middle values for even counts', () => {
      assert.strictEqual(median([4, -2, 1, 7]), 2.5);
      assert.strictEqual(median([]), 0);
    });

    it('should not reorder its input', () => {
      const values = [5, 1, 3];
      median(values);
      assert.deepStrictEqual(values, [5, 1, 3]);
    });
  });

  describe('logCompress', () => {
    it('should map zero to zero and preserve sign', () => {
      assert.strictEqual(logCompress(0), 0);
      assert.strictEqual(logCompress(-20), -logCompress(20));
      assert.ok(Math.abs(logCompress(Math.E - 1) - 1) < 1e-12);
    });

    it('should be monotonic', () => {
      const inputs = [-1000, -5, -0.5, 0, 0.5, 5, 1000];
      const outputs = inputs.map(logCompress);
      for (let i = 1; i < outputs.length; i++) {
        assert.ok(outputs[i] > outputs[i - 1]);
      }
    });
  });

  describe('threshold methods', () => {
    it('should compare against the mean of the basis for average', () => {
      const bits = generateBitmask([10, 3, -1, 2, 0], [3, -1, 2, 0], 'average');
      assert.deepStrictEqual(bits, [1, 1, 0, 1, 0]);
    });

    it('should emit 0 for values equal to the threshold', () => {
      assert.deepStrictEqual(generateBitmask([5, 1, 1, 1], [1, 1, 1], 'average'), [1, 0, 0, 0]);
      assert.deepStrictEqual(generateBitmask([3, 1, 2], [3, 1, 2], 'median'), [1, 0, 0]);
    });

    it('should compare against the median of the basis for median', () => {
      const bits = generateBitmask([9, 4, -2, 1, 7], [4, -2, 1, 7], 'median');
      assert.deepStrictEqual(bits, [1, 1, 0, 0, 1]);
    });

    it('should use the supplied wider basis for average_x', () => {
      assert.deepStrictEqual(generateBitmask([1, 2], [0, 0, 0, 10], 'average_x'), [0, 0]);
      assert.deepStrictEqual(generateBitmask([1, 2], [0, 0, 0, 4], 'average_x'), [0, 1]);
    });

    it('should damp the influence of outliers for log', () => {
      const values = [1000, 20, 30, -20, -30];
      // The outlier drags the arithmetic mean above every other value
      assert.deepStrictEqual(generateBitmask(values, values, 'average'), [1, 0, 0, 0, 0]);
      assert.deepStrictEqual(generateBitmask(values, values, 'log'), [1, 1, 1, 0, 0]);
      assert.ok(Math.abs(computeThreshold('log', values) - Math.log(1001) / 5) < 1e-12);
    });

    it('should fall back to a zero threshold for an empty basis', () => {
      assert.deepStrictEqual(generateBitmask([5, -5], [], 'average'), [1, 0]);
      assert.deepStrictEqual(generateBitmask([5, -5], [], 'median'), [1, 0]);
    });
  });

  describe('diff', () => {
    it('should compare each value with its predecessor and the first with zero', () => {
      assert.deepStrictEqual(generateBitmask([3, 5, 5, 2, 7], [], 'diff'), [1, 1, 0, 0, 1]);
      assert.deepStrictEqual(generateBitmask([-1, 0], [], 'diff'), [0, 1]);
    });

    it('should ignore the basis', () => {
      assert.deepStrictEqual(
        generateBitmask([3, 1], [100, 200], 'diff'),
        generateBitmask([3, 1], [], 'diff')
      );
    });
  });

  it('should keep the input order and length', () => {
    const values = [0.3, -2, 8, 1.5, -0.1, 4];
    for (const method of ['average', 'median', 'average_x', 'log', 'diff'] as const) {
      assert.strictEqual(generateBitmask(values, values, method).length, values.length);
    }
  });
});
