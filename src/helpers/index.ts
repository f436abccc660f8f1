export type {
  LuminanceGrid,
  CoefficientMatrix,
  Coordinate,
  Geometry,
  SquareGeometry,
  LinearGeometry,
  HashMethod,
  HashConfig,
  HashResult,
  Bit,
  SelectionPlan,
} from './types.js';
export { HASH_METHODS } from './types.js';

export { dct1d, dct2d, NOISE_FLOOR } from './dct.js';

export {
  squareOrder,
  diagonalOrder,
  reducedSquareOrder,
  selectionOrder,
  planSelection,
  extractValues,
  reducedSize,
} from './selection.js';

export { mirrorMatrix, magnitudes } from './mirror.js';

export {
  mean,
  median,
  logCompress,
  computeThreshold,
  generateBitmask,
} from './bitmask.js';

export { encodeBits, decodeHex, assertHex } from './encoding.js';
