import { createEngineOptions, type EngineOptions } from './engineOptions.js';
import { compareHashes, type HashComparison } from './hammingDistance.js';
import type { HashConfigInput } from './hashConfig.js';
import { Hasher } from './Hasher.js';
import type { CoefficientMatrix, HashResult } from './helpers/types.js';
import {
  defaultLuminanceProvider,
  type ImageSource,
  type LuminanceGridProvider,
} from './luminanceProviders.js';

export { ImageHasher, hashImage, compareImages, areImagesSimilar };

export interface ImageHasherOptions {
  provider?: LuminanceGridProvider;
  options?: EngineOptions;
}

/**
 * Asynchronous wrapper around {@link Hasher} for images that still need to
 * be decoded. The provider runs once, on the first request; concurrent first
 * requests share the same pending load. A failed load is forgotten so a later
 * call can try again.
 */
class ImageHasher {
  readonly source: ImageSource;
  readonly provider: LuminanceGridProvider;
  readonly options: EngineOptions;

  private pending: Promise<Hasher> | undefined;

  private constructor(
    source: ImageSource,
    provider: LuminanceGridProvider,
    options: EngineOptions
  ) {
    this.source = source;
    this.provider = provider;
    this.options = options;
  }

  static fromSource(
    source: ImageSource,
    {
      provider = defaultLuminanceProvider(),
      options = createEngineOptions(),
    }: ImageHasherOptions = {}
  ): ImageHasher {
    return new ImageHasher(source, provider, options);
  }

  /**
   * Resolves to the underlying synchronous hasher, loading the grid if needed.
   */
  hasher(): Promise<Hasher> {
    if (!this.pending) {
      this.pending = this.provider.load(this.source, this.options.size).then(
        (grid) => new Hasher(grid, this.options),
        (error: unknown) => {
          this.pending = undefined;
          throw error;
        }
      );
    }
    return this.pending;
  }

  async hash(config: HashConfigInput = {}): Promise<HashResult> {
    const hasher = await this.hasher();
    return hasher.hash(config);
  }

  async coefficients(): Promise<CoefficientMatrix> {
    const hasher = await this.hasher();
    return hasher.coefficients();
  }
}

/**
 * Hashes a single image in one call.
 */
async function hashImage(
  source: ImageSource,
  config: HashConfigInput = {},
  hasherOptions: ImageHasherOptions = {}
): Promise<HashResult> {
  return ImageHasher.fromSource(source, hasherOptions).hash(config);
}

/**
 * Hashes two images with the same configuration and compares them.
 */
async function compareImages(
  sourceA: ImageSource,
  sourceB: ImageSource,
  config: HashConfigInput = {},
  hasherOptions: ImageHasherOptions = {}
): Promise<HashComparison> {
  const [hashA, hashB] = await Promise.all([
    hashImage(sourceA, config, hasherOptions),
    hashImage(sourceB, config, hasherOptions),
  ]);
  return compareHashes(hashA.hex, hashB.hex, hashA.bitLength);
}

/**
 * Checks if two images are visually similar
 * @param threshold - Maximum Hamming distance still considered similar
 * @returns True when the distance is within the threshold
 */
async function areImagesSimilar(
  sourceA: ImageSource,
  sourceB: ImageSource,
  threshold = 10,
  config: HashConfigInput = {},
  hasherOptions: ImageHasherOptions = {}
): Promise<boolean> {
  const { distance } = await compareImages(
    sourceA,
    sourceB,
    config,
    hasherOptions
  );
  return distance <= threshold;
}
