import { ConfigurationError } from './errors.js';
import { createEngineOptions, type EngineOptions } from './engineOptions.js';
import {
  configKey,
  resolveHashConfig,
  type HashConfigInput,
} from './hashConfig.js';
import { generateBitmask } from './helpers/bitmask.js';
import { dct2d } from './helpers/dct.js';
import { encodeBits } from './helpers/encoding.js';
import { magnitudes, mirrorMatrix } from './helpers/mirror.js';
import {
  extractValues,
  planSelection,
  selectionOrder,
} from './helpers/selection.js';
import type {
  CoefficientMatrix,
  Coordinate,
  HashConfig,
  HashResult,
  LuminanceGrid,
} from './helpers/types.js';

export { Hasher, computeHash, coefficientMatrix };

/** A grid, or a function that produces one on first use. */
export type GridSource = LuminanceGrid | (() => LuminanceGrid);

/**
 * Perceptual hasher for a single image.
 *
 * The luminance grid and its coefficient matrix are produced at most once, on
 * the first request that needs them. Each distinct configuration is computed
 * once and cached for the lifetime of the instance; nothing is shared between
 * instances.
 */
class Hasher {
  readonly options: EngineOptions;

  private readonly gridSource: GridSource;
  private gridCache: LuminanceGrid | undefined;
  private coefficientsCache: CoefficientMatrix | undefined;
  private mirroredCache: CoefficientMatrix | undefined;
  private readonly results = new Map<string, HashResult>();

  constructor(grid: GridSource, options: EngineOptions = createEngineOptions()) {
    this.gridSource = grid;
    this.options = options;
  }

  /**
   * Luminance grid, loaded and checked (shape and finite samples) on first access.
   */
  get grid(): LuminanceGrid {
    if (this.gridCache === undefined) {
      const grid =
        typeof this.gridSource === 'function'
          ? this.gridSource()
          : this.gridSource;
      const { size } = this.options;
      if (grid.length !== size || grid.some((row) => row.length !== size)) {
        throw new ConfigurationError(
          `Luminance grid must be ${size}x${size} to match the engine size`
        );
      }
      grid.forEach((row, y) =>
        row.forEach((sample, x) => {
          if (!Number.isFinite(sample)) {
            throw new ConfigurationError(
              `Luminance grid sample at (${y}, ${x}) is not a finite number`
            );
          }
        })
      );
      this.gridCache = grid;
    }
    return this.gridCache;
  }

  /**
   * DCT coefficients of the grid, computed once.
   */
  coefficients(): CoefficientMatrix {
    if (this.coefficientsCache === undefined) {
      this.coefficientsCache = dct2d(this.grid);
    }
    return this.coefficientsCache;
  }

  /**
   * Coefficients of the horizontally mirrored image, derived once from
   * {@link coefficients}.
   */
  mirroredCoefficients(): CoefficientMatrix {
    if (this.mirroredCache === undefined) {
      this.mirroredCache = mirrorMatrix(this.coefficients());
    }
    return this.mirroredCache;
  }

  /**
   * Coordinates that make up the bits of a hash, in bit order. Needs no image
   * data.
   */
  selectionOrder(input: HashConfigInput = {}): Coordinate[] {
    const config = resolveHashConfig(input, this.options.defaults);
    return selectionOrder(config.geometry, config.reduce, this.options.size);
  }

  /**
   * Perceptual hash of the image under a configuration.
   * @param input - Overrides merged over the engine defaults
   * @returns The cached result when this configuration was computed before
   */
  hash(input: HashConfigInput = {}): HashResult {
    const config = resolveHashConfig(input, this.options.defaults);
    const key = configKey(config);

    const cached = this.results.get(key);
    if (cached) return cached;

    const result = this.compute(config);
    this.results.set(key, result);
    return result;
  }

  /** Number of configurations currently cached. */
  get cacheSize(): number {
    return this.results.size;
  }

  private compute(config: HashConfig): HashResult {
    // Validate the geometry against the grid size before touching the image
    const plan = planSelection(
      config.geometry,
      config.reduce,
      config.method,
      this.options.size
    );

    const matrix = config.mirror
      ? this.mirroredCoefficients()
      : this.coefficients();

    let values = extractValues(matrix, plan.order);
    let basis = extractValues(matrix, plan.basis);
    if (config.mirrorproof) {
      values = magnitudes(values);
      basis = magnitudes(basis);
    }

    const bits = Object.freeze(generateBitmask(values, basis, config.method));
    return Object.freeze({
      bits,
      hex: encodeBits(bits),
      bitLength: bits.length,
    });
  }
}

/**
 * Functional form of {@link Hasher.hash}.
 */
function computeHash(hasher: Hasher, config: HashConfigInput = {}): HashResult {
  return hasher.hash(config);
}

function coefficientMatrix(hasher: Hasher): CoefficientMatrix {
  return hasher.coefficients();
}
