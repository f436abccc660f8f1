export {
  // Per-image engine and its functional API
  Hasher,
  computeHash,
  coefficientMatrix,
  type GridSource,
} from './Hasher.js';

export {
  hammingDistance,
  compareHashes,
  type HashComparison,
} from './hammingDistance.js';

export {
  // Configuration
  DEFAULT_HASH_CONFIG,
  parseGeometry,
  formatGeometry,
  parseMethod,
  resolveHashConfig,
  configKey,
  type HashConfigInput,
} from './hashConfig.js';

export {
  DEFAULT_GRID_SIZE,
  createEngineOptions,
  loadEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
} from './engineOptions.js';

export {
  PerceptualHashError,
  ConfigurationError,
  HashInputError,
  SourceUnavailableError,
} from './errors.js';

export {
  // Image decoding, outside the engine
  SharpLuminanceProvider,
  RawGridProvider,
  ChainedLuminanceProvider,
  defaultLuminanceProvider,
  type ImageSource,
  type LuminanceGridProvider,
  type ResizeKernel,
} from './luminanceProviders.js';

export {
  ImageHasher,
  hashImage,
  compareImages,
  areImagesSimilar,
  type ImageHasherOptions,
} from './imageHasher.js';

export * from './helpers/index.js';
