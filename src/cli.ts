#!/usr/bin/env node
import * as dotenv from 'dotenv';
import path from 'path';
import { pathToFileURL } from 'url';
import { loadEngineOptions, createEngineOptions, parseBoolean } from './engineOptions.js';
import { ConfigurationError, PerceptualHashError } from './errors.js';
import { formatGeometry, resolveHashConfig, type HashConfigInput } from './hashConfig.js';
import { compareHashes } from './hammingDistance.js';
import { ImageHasher } from './imageHasher.js';

export { parseCliArgs, USAGE };

export type CliCommand =
  | { command: 'help' }
  | {
      command: 'hash';
      images: string[];
      config: HashConfigInput;
      size?: number;
    }
  | {
      command: 'compare';
      images: [string, string];
      config: HashConfigInput;
      size?: number;
      threshold: number;
    };

const USAGE = `Usage:
  phash hash <image...> [options]
  phash compare <imageA> <imageB> [options] [--threshold N]

Options:
  --geometry G       NxN square block or a coefficient count (default 8x8)
  --method M         average | median | average_x | log | diff
  --reduce[=B]       keep only the upper-left triangle, without DC
  --mirror[=B]       hash the horizontally mirrored image
  --mirrorproof[=B]  hash coefficient magnitudes
  --size N           luminance grid size (default 32)
  --threshold N      maximum distance reported as similar (default 10)

Defaults can also be set with PHASH_* variables in a .env file.`;

const DEFAULT_THRESHOLD = 10;

function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

/**
 * Parses CLI arguments (without the node binary and script path).
 */
function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  if (command !== 'hash' && command !== 'compare') {
    throw new ConfigurationError(`Unknown command "${command}"`);
  }

  const config: HashConfigInput = {};
  const images: string[] = [];
  let size: number | undefined;
  let threshold: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      images.push(arg);
      continue;
    }

    // Accept both "--flag value" and "--flag=value"
    const [flag, inline] = arg.split(/=(.*)/s, 2);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`${flag} expects a value`);
      }
      i++;
      return next;
    };
    // Switches take no separate value; "--reduce=false" is read as a boolean
    const takeSwitch = (): boolean =>
      inline === undefined ? true : parseBoolean(flag, inline);

    switch (flag) {
      case '--geometry':
        config.geometry = takeValue();
        break;
      case '--method':
        config.method = takeValue();
        break;
      case '--reduce':
        config.reduce = takeSwitch();
        break;
      case '--mirror':
        config.mirror = takeSwitch();
        break;
      case '--mirrorproof':
        config.mirrorproof = takeSwitch();
        break;
      case '--size':
        size = parseCount(flag, takeValue());
        break;
      case '--threshold':
        threshold = parseCount(flag, takeValue());
        break;
      default:
        throw new ConfigurationError(`Unknown option "${flag}"`);
    }
  }

  if (command === 'hash') {
    if (images.length === 0) {
      throw new ConfigurationError('hash needs at least one image');
    }
    if (threshold !== undefined) {
      throw new ConfigurationError('--threshold only applies to compare');
    }
    return { command, images, config, size };
  }

  if (images.length !== 2) {
    throw new ConfigurationError(`compare needs exactly two images, got ${images.length}`);
  }
  return {
    command,
    images: [images[0], images[1]],
    config,
    size,
    threshold: threshold ?? DEFAULT_THRESHOLD,
  };
}

async function main() {
  // Load environment variables
  dotenv.config();

  let parsed: CliCommand;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}\n`);
    console.error(USAGE);
    process.exit(1);
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return;
  }

  const envOptions = loadEngineOptions();
  const options =
    parsed.size === undefined
      ? envOptions
      : createEngineOptions({ size: parsed.size, defaults: envOptions.defaults });
  // Resolve once up front so bad flags fail before any image is decoded
  const config = resolveHashConfig(parsed.config, options.defaults);
  const label = `${formatGeometry(config.geometry)}${config.reduce ? ' reduced' : ''}, ${config.method}`;

  if (parsed.command === 'hash') {
    console.log(`🔍 Hashing ${parsed.images.length} image(s) (${label})\n`);
    for (const image of parsed.images) {
      const result = await ImageHasher.fromSource(image, { options }).hash(config);
      console.log(`${result.hex}  ${path.basename(image)}`);
    }
    return;
  }

  const [imageA, imageB] = parsed.images;
  console.log(`🔍 Comparing images (${label})\n`);
  const [hashA, hashB] = await Promise.all([
    ImageHasher.fromSource(imageA, { options }).hash(config),
    ImageHasher.fromSource(imageB, { options }).hash(config),
  ]);
  const comparison = compareHashes(hashA.hex, hashB.hex, hashA.bitLength);
  console.log(`${path.basename(imageA)}: ${hashA.hex}`);
  console.log(`${path.basename(imageB)}: ${hashB.hex}`);
  console.log(`Distance:   ${comparison.distance} / ${comparison.bitLength} bits`);
  console.log(`Similarity: ${(comparison.similarity * 100).toFixed(2)}%`);
  console.log(
    comparison.distance <= parsed.threshold
      ? `✅ Similar (threshold ${parsed.threshold})`
      : `❌ Different (threshold ${parsed.threshold})`
  );
}

const invokedDirectly =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href;

if (invokedDirectly) {
  main().catch((error) => {
    if (error instanceof PerceptualHashError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('❌ Unexpected error:', error);
    }
    process.exit(1);
  });
}
