/** Row-major square grid of luminance samples, `grid[row][col]`. */
export type LuminanceGrid = readonly (readonly number[])[];

/** Row-major square grid of DCT coefficients; `[0][0]` is the DC term. */
export type CoefficientMatrix = readonly (readonly number[])[];

/** A `[row, col]` position inside a coefficient matrix. */
export type Coordinate = readonly [row: number, col: number];

export type SquareGeometry = { readonly kind: 'square'; readonly size: number };
export type LinearGeometry = { readonly kind: 'linear'; readonly count: number };
export type Geometry = SquareGeometry | LinearGeometry;

export const HASH_METHODS = [
  'average',
  'median',
  'average_x',
  'log',
  'diff',
] as const;

export type HashMethod = (typeof HASH_METHODS)[number];

export interface HashConfig {
  readonly geometry: Geometry;
  // Triangular truncation, square geometry only
  readonly reduce: boolean;
  readonly method: HashMethod;
  // Hash the horizontally mirrored image
  readonly mirror: boolean;
  // Hash coefficient magnitudes so that mirror images collide
  readonly mirrorproof: boolean;
}

export type Bit = 0 | 1;

export interface HashResult {
  readonly bits: readonly Bit[];
  /** MSB-first hex, left-padded to `ceil(bitLength / 4)` digits */
  readonly hex: string;
  readonly bitLength: number;
}

/**
 * The coordinates that become bits, plus the coordinates whose values set
 * the threshold. The basis never contains the DC term.
 */
export interface SelectionPlan {
  readonly order: readonly Coordinate[];
  readonly basis: readonly Coordinate[];
}
