import sharp from 'sharp';
import { ConfigurationError, SourceUnavailableError } from './errors.js';
import type { LuminanceGrid } from './helpers/types.js';

export {
  SharpLuminanceProvider,
  RawGridProvider,
  ChainedLuminanceProvider,
  defaultLuminanceProvider,
  isLuminanceGrid,
};

/**
 * Anything a provider may know how to turn into a luminance grid: encoded
 * image bytes, a file path, or an already sampled grid.
 */
export type ImageSource = Uint8Array | string | LuminanceGrid;

/**
 * Turns an image into a `size`×`size` luminance grid.
 *
 * Hashes are only comparable when they come from the same provider, provider
 * version and resize settings: a different resampler yields a different grid
 * and therefore a different hash.
 */
export interface LuminanceGridProvider {
  readonly name: string;
  load(source: ImageSource, size: number): Promise<LuminanceGrid>;
}

export type ResizeKernel = keyof sharp.KernelEnum;

export interface SharpProviderOptions {
  // Resampling kernel used when shrinking to the grid size
  kernel?: ResizeKernel;
}

function isLuminanceGrid(source: ImageSource): source is LuminanceGrid {
  return Array.isArray(source);
}

/**
 * Decodes with sharp, converts to grayscale and resizes (ignoring aspect
 * ratio) to the grid size. Samples are 0..255.
 */
class SharpLuminanceProvider implements LuminanceGridProvider {
  readonly name = 'sharp';
  readonly kernel: ResizeKernel;

  constructor({ kernel = 'lanczos3' }: SharpProviderOptions = {}) {
    this.kernel = kernel;
  }

  async load(source: ImageSource, size: number): Promise<LuminanceGrid> {
    if (isLuminanceGrid(source)) {
      throw new SourceUnavailableError(
        this.name,
        'Expected encoded image bytes or a file path'
      );
    }

    let pixels: Buffer;
    let channels: number;
    try {
      const { data, info } = await sharp(source)
        .removeAlpha()
        .grayscale()
        .resize(size, size, { fit: 'fill', kernel: this.kernel })
        .raw()
        .toBuffer({ resolveWithObject: true });
      pixels = data;
      channels = info.channels;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(
        this.name,
        `Could not decode image: ${reason}`,
        { cause: error }
      );
    }

    // Keep the first channel of each pixel
    const grid: number[][] = [];
    for (let row = 0; row < size; row++) {
      const samples: number[] = new Array(size);
      for (let col = 0; col < size; col++) {
        samples[col] = pixels[(row * size + col) * channels];
      }
      grid.push(samples);
    }
    return grid;
  }
}

/**
 * Accepts grids that were sampled elsewhere, as long as they already have the
 * requested size.
 */
class RawGridProvider implements LuminanceGridProvider {
  readonly name = 'raw-grid';

  async load(source: ImageSource, size: number): Promise<LuminanceGrid> {
    if (!isLuminanceGrid(source)) {
      throw new SourceUnavailableError(
        this.name,
        'Expected a pre-sampled luminance grid'
      );
    }
    if (
      source.length !== size ||
      source.some((row) => row.length !== size)
    ) {
      throw new SourceUnavailableError(
        this.name,
        `Expected a ${size}x${size} grid`
      );
    }
    if (source.some((row) => row.some((value) => !Number.isFinite(value)))) {
      throw new SourceUnavailableError(
        this.name,
        'Grid contains non-finite samples'
      );
    }
    return source;
  }
}

/**
 * Tries each provider in priority order and returns the first grid produced.
 * Every provider is attempted at most once per load.
 */
class ChainedLuminanceProvider implements LuminanceGridProvider {
  readonly name: string;
  readonly providers: readonly LuminanceGridProvider[];

  constructor(providers: readonly LuminanceGridProvider[]) {
    if (providers.length === 0) {
      throw new ConfigurationError(
        'ChainedLuminanceProvider needs at least one provider'
      );
    }
    this.providers = providers;
    this.name = providers.map((provider) => provider.name).join(' > ');
  }

  async load(source: ImageSource, size: number): Promise<LuminanceGrid> {
    const failures: unknown[] = [];
    for (const provider of this.providers) {
      try {
        return await provider.load(source, size);
      } catch (error) {
        failures.push(error);
      }
    }

    const details = failures
      .map((error, i) => {
        const reason = error instanceof Error ? error.message : String(error);
        return `${this.providers[i].name}: ${reason}`;
      })
      .join('; ');
    throw new SourceUnavailableError(
      this.name,
      `No provider could load the image (${details})`,
      { cause: new AggregateError(failures) }
    );
  }
}

/**
 * Pre-sampled grids first, then sharp for encoded images and file paths.
 */
function defaultLuminanceProvider(): ChainedLuminanceProvider {
  return new ChainedLuminanceProvider([
    new RawGridProvider(),
    new SharpLuminanceProvider(),
  ]);
}
