import { ConfigurationError } from './errors.js';
import {
  DEFAULT_HASH_CONFIG,
  formatGeometry,
  resolveHashConfig,
  type HashConfigInput,
} from './hashConfig.js';
import { planSelection } from './helpers/selection.js';
import type { HashConfig } from './helpers/types.js';

export {
  DEFAULT_GRID_SIZE,
  ENV_VARIABLES,
  createEngineOptions,
  loadEngineOptions,
  parseBoolean,
};

/**
 * Immutable engine settings handed to every Hasher. Replaces any notion of
 * process-wide defaults.
 */
export interface EngineOptions {
  // Side of the luminance grid and of the coefficient matrix
  readonly size: number;
  readonly defaults: HashConfig;
}

export interface EngineOptionsInput {
  size?: number;
  defaults?: HashConfigInput;
}

const DEFAULT_GRID_SIZE = 32;

const ENV_VARIABLES = {
  size: 'PHASH_SIZE',
  geometry: 'PHASH_GEOMETRY',
  method: 'PHASH_METHOD',
  reduce: 'PHASH_REDUCE',
  mirror: 'PHASH_MIRROR',
  mirrorproof: 'PHASH_MIRRORPROOF',
} as const;

function createEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  const size = input.size ?? DEFAULT_GRID_SIZE;
  if (!Number.isSafeInteger(size) || size < 2) {
    throw new ConfigurationError(
      `Invalid grid size ${size}: expected an integer of at least 2`
    );
  }
  const defaults = resolveHashConfig(input.defaults, DEFAULT_HASH_CONFIG);
  // The defaults must be usable as-is on a grid of this size
  try {
    planSelection(defaults.geometry, defaults.reduce, defaults.method, size);
  } catch (error) {
    throw new ConfigurationError(
      `Default geometry ${formatGeometry(defaults.geometry)} does not fit grid size ${size}`,
      { cause: error }
    );
  }
  return Object.freeze({ size, defaults });
}

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigurationError(
    `${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}, got "${value}"`
  );
}

/**
 * Builds engine options from environment variables. Unset or empty variables
 * fall back to the built-in defaults.
 * @param env - Variables to read, `process.env` by default
 */
function loadEngineOptions(
  env: Record<string, string | undefined> = process.env
): EngineOptions {
  const provided: string[] = [];
  const read = (name: string): string | undefined => {
    const value = env[name];
    if (value === undefined || value.trim() === '') return undefined;
    provided.push(name);
    return value;
  };

  const defaults: HashConfigInput = {};
  const input: EngineOptionsInput = { defaults };

  const size = read(ENV_VARIABLES.size);
  if (size !== undefined) {
    if (!/^\d+$/.test(size.trim())) {
      throw new ConfigurationError(
        `${ENV_VARIABLES.size} must be a positive integer, got "${size}"`
      );
    }
    input.size = Number(size);
  }

  const geometry = read(ENV_VARIABLES.geometry);
  if (geometry !== undefined) defaults.geometry = geometry;

  const method = read(ENV_VARIABLES.method);
  if (method !== undefined) defaults.method = method;

  const reduce = read(ENV_VARIABLES.reduce);
  if (reduce !== undefined) {
    defaults.reduce = parseBoolean(ENV_VARIABLES.reduce, reduce);
  }

  const mirror = read(ENV_VARIABLES.mirror);
  if (mirror !== undefined) {
    defaults.mirror = parseBoolean(ENV_VARIABLES.mirror, mirror);
  }

  const mirrorproof = read(ENV_VARIABLES.mirrorproof);
  if (mirrorproof !== undefined) {
    defaults.mirrorproof = parseBoolean(ENV_VARIABLES.mirrorproof, mirrorproof);
  }

  try {
    return createEngineOptions(input);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(
        `Invalid environment configuration: ${error.message} (set: ${provided.join(', ')})`,
        { cause: error }
      );
    }
    throw error;
  }
}
