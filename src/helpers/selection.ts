import { ConfigurationError } from '../errors.js';
import type {
  CoefficientMatrix,
  Coordinate,
  Geometry,
  HashMethod,
  SelectionPlan,
} from './types.js';

export {
  squareOrder,
  diagonalOrder,
  reducedSquareOrder,
  selectionOrder,
  planSelection,
  extractValues,
  reducedSize,
};

/**
 * Row-major coordinates of the top-left n×n block.
 */
function squareOrder(n: number): Coordinate[] {
  const order: Coordinate[] = [];
  for (let row = 0; row < n; row++) {
    for (let col = 0; col < n; col++) {
      order.push([row, col]);
    }
  }
  return order;
}

/**
 * The first `count` coordinates of a `size`×`size` matrix in diagonal order:
 * diagonals `row + col = d` by increasing d, rows increasing inside a diagonal.
 */
function diagonalOrder(count: number, size: number): Coordinate[] {
  const order: Coordinate[] = [];
  for (let d = 0; d <= 2 * (size - 1) && order.length < count; d++) {
    const firstRow = Math.max(0, d - (size - 1));
    const lastRow = Math.min(d, size - 1);
    for (let row = firstRow; row <= lastRow && order.length < count; row++) {
      order.push([row, d - row]);
    }
  }
  return order;
}

/**
 * Upper-left triangle of the n×n block (`row + col <= n - 1`) without the DC
 * term, still in row-major order.
 */
function reducedSquareOrder(n: number): Coordinate[] {
  return squareOrder(n).filter(
    ([row, col]) => row + col <= n - 1 && !(row === 0 && col === 0)
  );
}

/**
 * Number of coefficients a reduced `Square(n)` keeps.
 */
function reducedSize(n: number): number {
  return ((n - 1) * (n + 2)) / 2;
}

function assertFits(geometry: Geometry, size: number, needed: number) {
  if (geometry.kind === 'square' && geometry.size > size) {
    throw new ConfigurationError(
      `Geometry ${geometry.size}x${geometry.size} does not fit a ${size}x${size} coefficient matrix`
    );
  }
  if (geometry.kind === 'linear' && needed > size * size) {
    throw new ConfigurationError(
      `Geometry needs ${needed} coefficients but a ${size}x${size} matrix only has ${size * size}`
    );
  }
}

/**
 * Canonical bit order for a geometry. Depends only on its arguments, never on
 * image content.
 * @param geometry - Square or linear selection
 * @param reduce - Triangular truncation; ignored for linear geometry
 * @param size - Side of the coefficient matrix
 */
function selectionOrder(
  geometry: Geometry,
  reduce: boolean,
  size: number
): Coordinate[] {
  if (geometry.kind === 'linear') {
    assertFits(geometry, size, geometry.count);
    return diagonalOrder(geometry.count, size);
  }

  assertFits(geometry, size, geometry.size * geometry.size);
  if (!reduce) {
    return squareOrder(geometry.size);
  }
  if (geometry.size < 2) {
    throw new ConfigurationError('Reduced geometry must be at least 2x2');
  }
  return reducedSquareOrder(geometry.size);
}

const isDC = ([row, col]: Coordinate) => row === 0 && col === 0;

/**
 * Works out both the bit order and the threshold basis for a configuration.
 *
 * The basis is the bit order itself for every method except `average_x`,
 * which widens it to the unreduced square (reduced square geometry) or to the
 * first 2k diagonal coefficients (linear geometry). DC is never in the basis.
 */
function planSelection(
  geometry: Geometry,
  reduce: boolean,
  method: HashMethod,
  size: number
): SelectionPlan {
  const order = selectionOrder(geometry, reduce, size);

  let basis: Coordinate[] = order;
  if (method === 'average_x') {
    if (geometry.kind === 'linear') {
      assertFits(geometry, size, 2 * geometry.count);
      basis = diagonalOrder(2 * geometry.count, size);
    } else if (reduce) {
      basis = squareOrder(geometry.size);
    }
  }

  return { order, basis: basis.filter((coordinate) => !isDC(coordinate)) };
}

/**
 * Reads the coefficient values at the given coordinates, in order.
 */
function extractValues(
  matrix: CoefficientMatrix,
  coordinates: readonly Coordinate[]
): number[] {
  return coordinates.map(([row, col]) => matrix[row][col]);
}
