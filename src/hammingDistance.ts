import { HashInputError } from './errors.js';
import { assertHex } from './helpers/encoding.js';

export { hammingDistance, compareHashes, popcount32 };

// 16 hex digits fit a single 64-bit word
const WORD_DIGITS = 16;
// Longer hashes are compared 32 bits at a time
const CHUNK_DIGITS = 8;

/**
 * Set bits in a 32-bit unsigned integer.
 */
function popcount32(value: number): number {
  let v = value >>> 0;
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  v = (v + (v >>> 4)) & 0x0f0f0f0f;
  return Math.imul(v, 0x01010101) >>> 24;
}

function popcountBigInt(value: bigint): number {
  let x = value;
  let count = 0;
  while (x > 0n) {
    x &= x - 1n;
    count++;
  }
  return count;
}

/**
 * Computes the Hamming distance between two hex-encoded hashes
 * @param hashA - First hash
 * @param hashB - Second hash, same number of hex digits as the first
 * @returns Number of differing bits
 */
function hammingDistance(hashA: string, hashB: string): number {
  assertHex(hashA, 'First hash');
  assertHex(hashB, 'Second hash');
  if (hashA.length !== hashB.length) {
    throw new HashInputError(
      `Hash lengths differ: ${hashA.length * 4} bits vs ${hashB.length * 4} bits`
    );
  }

  if (hashA.length <= WORD_DIGITS) {
    return popcountBigInt(BigInt('0x' + hashA) ^ BigInt('0x' + hashB));
  }

  let distance = 0;
  for (let i = 0; i < hashA.length; i += CHUNK_DIGITS) {
    const a = parseInt(hashA.slice(i, i + CHUNK_DIGITS), 16);
    const b = parseInt(hashB.slice(i, i + CHUNK_DIGITS), 16);
    distance += popcount32(a ^ b);
  }
  return distance;
}

export interface HashComparison {
  distance: number;
  bitLength: number;
  // 1 for identical hashes, 0 when every bit differs
  similarity: number;
}

/**
 * Distance plus a normalized similarity score.
 * @param bitLength - Real bit count when the hex carries padding bits; defaults to 4 per digit
 */
function compareHashes(
  hashA: string,
  hashB: string,
  bitLength = hashA.length * 4
): HashComparison {
  const distance = hammingDistance(hashA, hashB);
  if (bitLength < Math.max(1, distance) || bitLength > hashA.length * 4) {
    throw new HashInputError(
      `Bit length ${bitLength} is inconsistent with ${hashA.length} hex digits`
    );
  }
  const similarity = Math.round((1 - distance / bitLength) * 10000) / 10000;
  return { distance, bitLength, similarity };
}
