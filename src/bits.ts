/**
 * Integer helpers for bit-width and block-size derivation.
 */

export const BITS_PER_BYTE = 8;

/**
 * Check whether a number is a positive power of two.
 */
export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Exponent of a power of two, e.g. 64 => 6.
 *
 * @throws RangeError if `n` is not a power of two
 */
export function log2PowerOfTwo(n: number): number {
  if (!isPowerOfTwo(n)) {
    throw new RangeError(`Expected a power of two, got ${n}`);
  }
  return 31 - Math.clz32(n);
}

export function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return Math.abs(a);
}

export function lcm(a: number, b: number): number {
  if (a === 0 || b === 0) {
    return 0;
  }
  return Math.abs(a * b) / gcd(a, b);
}

/**
 * Number of symbols whose combined bit capacity is a whole number of bytes.
 *
 * Encoded output is padded to a multiple of this many symbols, so Base64
 * (6 bits) gives 4 and Base32 (5 bits) gives 8.
 *
 * @param bitsPerSymbol - Bits carried by one data symbol
 */
export function symbolsPerBlock(bitsPerSymbol: number): number {
  return lcm(bitsPerSymbol, BITS_PER_BYTE) / bitsPerSymbol;
}
