import { ConfigurationError } from './errors.js';
import {
  HASH_METHODS,
  type Geometry,
  type HashConfig,
  type HashMethod,
} from './helpers/types.js';

export {
  DEFAULT_HASH_CONFIG,
  parseGeometry,
  formatGeometry,
  parseMethod,
  resolveHashConfig,
  configKey,
};

/**
 * Partial configuration accepted from callers. Geometry may be given in its
 * textual form (`"8x8"`, `"64"`) or as a bare coefficient count.
 */
export interface HashConfigInput {
  geometry?: Geometry | string | number;
  reduce?: boolean;
  method?: HashMethod | string;
  mirror?: boolean;
  mirrorproof?: boolean;
}

const DEFAULT_HASH_CONFIG: HashConfig = Object.freeze<HashConfig>({
  geometry: freezeGeometry({ kind: 'square', size: 8 }),
  reduce: false,
  method: 'average',
  mirror: false,
  mirrorproof: false,
});

const SQUARE_PATTERN = /^(\d+)[xX](\d+)$/;
const COUNT_PATTERN = /^\d+$/;

function freezeGeometry(geometry: Geometry): Geometry {
  return Object.freeze({ ...geometry });
}

function positiveInteger(value: number, source: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError(
      `Invalid geometry "${source}": expected a positive integer or NxN`
    );
  }
  return value;
}

/**
 * Parses a geometry specification.
 * @param value - `"NxN"` for a square block, or a positive integer for a
 * linear (diagonal order) selection
 */
function parseGeometry(value: string | number | Geometry): Geometry {
  if (typeof value === 'object') {
    const size = value.kind === 'square' ? value.size : value.count;
    positiveInteger(size, formatGeometry(value));
    return freezeGeometry(value);
  }

  if (typeof value === 'number') {
    return freezeGeometry({
      kind: 'linear',
      count: positiveInteger(value, String(value)),
    });
  }

  const text = value.trim();
  const square = SQUARE_PATTERN.exec(text);
  if (square) {
    const rows = Number(square[1]);
    const cols = Number(square[2]);
    if (rows !== cols) {
      throw new ConfigurationError(
        `Invalid geometry "${value}": square geometry needs equal sides`
      );
    }
    return freezeGeometry({ kind: 'square', size: positiveInteger(rows, value) });
  }
  if (COUNT_PATTERN.test(text)) {
    return freezeGeometry({
      kind: 'linear',
      count: positiveInteger(Number(text), value),
    });
  }

  throw new ConfigurationError(
    `Invalid geometry "${value}": expected a positive integer or NxN`
  );
}

function formatGeometry(geometry: Geometry): string {
  return geometry.kind === 'square'
    ? `${geometry.size}x${geometry.size}`
    : String(geometry.count);
}

function isHashMethod(value: string): value is HashMethod {
  return HASH_METHODS.some((method) => method === value);
}

function parseMethod(value: string): HashMethod {
  const normalized = value.trim().toLowerCase();
  if (!isHashMethod(normalized)) {
    throw new ConfigurationError(
      `Unknown hash method "${value}": expected one of ${HASH_METHODS.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Merges a partial configuration over defaults and validates the result.
 * @returns A frozen, fully specified configuration
 */
function resolveHashConfig(
  input: HashConfigInput = {},
  defaults: HashConfig = DEFAULT_HASH_CONFIG
): HashConfig {
  const geometry =
    input.geometry === undefined
      ? defaults.geometry
      : parseGeometry(input.geometry);
  const method =
    input.method === undefined ? defaults.method : parseMethod(input.method);
  const mirror = input.mirror ?? defaults.mirror;
  const mirrorproof = input.mirrorproof ?? defaults.mirrorproof;

  if (mirror && mirrorproof) {
    throw new ConfigurationError(
      'mirror and mirrorproof are mutually exclusive'
    );
  }

  return Object.freeze({
    geometry,
    reduce: input.reduce ?? defaults.reduce,
    method,
    mirror,
    mirrorproof,
  });
}

/**
 * Canonical cache key. `reduce` is dropped for linear geometry, where it has
 * no effect.
 */
function configKey(config: HashConfig): string {
  const reduce = config.geometry.kind === 'square' && config.reduce;
  return [
    formatGeometry(config.geometry),
    reduce ? 'reduce' : 'full',
    config.method,
    config.mirror ? 'mirror' : config.mirrorproof ? 'mirrorproof' : 'plain',
  ].join('|');
}
