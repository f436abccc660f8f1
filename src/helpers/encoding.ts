import { HashInputError } from '../errors.js';
import type { Bit } from './types.js';

export { encodeBits, decodeHex, assertHex };

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

/**
 * Throws a HashInputError unless `hex` is a non-empty string of hex digits.
 */
function assertHex(hex: string, label = 'hash'): void {
  if (hex.length === 0) {
    throw new HashInputError(`${label} is empty`);
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new HashInputError(`${label} contains non-hex characters: "${hex}"`);
  }
}

/**
 * Packs bits MSB-first into lowercase hex. The bit string is read as one
 * unsigned number, so a length that is not a multiple of 4 is padded with
 * leading zero bits.
 * @returns `ceil(bits.length / 4)` hex digits
 */
function encodeBits(bits: readonly Bit[]): string {
  if (bits.length === 0) return '';
  const digits = Math.ceil(bits.length / 4);
  const padded = new Array<Bit>(digits * 4 - bits.length).fill(0).concat(bits);

  let hex = '';
  for (let i = 0; i < padded.length; i += 4) {
    const nibble =
      (padded[i] << 3) | (padded[i + 1] << 2) | (padded[i + 2] << 1) | padded[i + 3];
    hex += nibble.toString(16);
  }
  return hex;
}

/**
 * Unpacks hex into bits, MSB-first.
 * @param hex - Hex digits, either case
 * @param bitLength - When given, the leading pad bits beyond this length are dropped
 */
function decodeHex(hex: string, bitLength?: number): Bit[] {
  assertHex(hex);
  const bits: Bit[] = [];
  for (const char of hex) {
    const nibble = parseInt(char, 16);
    for (let shift = 3; shift >= 0; shift--) {
      bits.push((nibble >> shift) & 1 ? 1 : 0);
    }
  }

  if (bitLength === undefined) return bits;
  if (!Number.isInteger(bitLength) || bitLength < 0 || bitLength > bits.length) {
    throw new HashInputError(
      `Bit length ${bitLength} does not fit ${hex.length} hex digits`
    );
  }
  return bits.slice(bits.length - bitLength);
}
