/**
 * Pre-defined alphabets.
 *
 * Each string lists the data symbols in value order followed by the padding
 * symbol, which is `=` throughout. The large alphabets are built from
 * contiguous runs of assigned BMP code points so every symbol is a single
 * UTF-16 unit.
 */

import { BaseN, type BaseNOptions } from "./base-n.js";

const PADDING = "=";

function codePointRun(start: number, count: number): string {
  let result = "";
  for (let codePoint = start; codePoint < start + count; codePoint++) {
    result += String.fromCodePoint(codePoint);
  }
  return result;
}

// Latin Extended-A and the start of Latin Extended-B
const LATIN_EXTENDED_START = 0x0100;
// CJK Unified Ideographs; the block holds over 20,000 assigned characters
const CJK_START = 0x4e00;

export const BASE2_ALPHABET = "01" + PADDING;
export const BASE4_ALPHABET = "ACGT" + PADDING;
export const BASE8_ALPHABET = "01234567" + PADDING;
export const BASE16_ALPHABET = "0123456789ABCDEF" + PADDING;

/** RFC 4648 Base32. */
export const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567" + PADDING;

/** RFC 4648 Base32 with extended hex digits; preserves sort order. */
export const BASE32_HEX_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUV" + PADDING;

export const BASE64_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/" + PADDING;

/** URL- and filename-safe Base64 (`-` and `_` in place of `+` and `/`). */
export const BASE64_URL_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_" + PADDING;

export const BASE256_ALPHABET = codePointRun(LATIN_EXTENDED_START, 256) + PADDING;
export const BASE512_ALPHABET = codePointRun(CJK_START, 512) + PADDING;
export const BASE1024_ALPHABET = codePointRun(CJK_START, 1024) + PADDING;
export const BASE2048_ALPHABET = codePointRun(CJK_START, 2048) + PADDING;
export const BASE4096_ALPHABET = codePointRun(CJK_START, 4096) + PADDING;

/**
 * Registry of named alphabets, used by {@link createCodec} and the CLI.
 */
export const ALPHABETS = {
  base2: BASE2_ALPHABET,
  base4: BASE4_ALPHABET,
  base8: BASE8_ALPHABET,
  base16: BASE16_ALPHABET,
  base32: BASE32_ALPHABET,
  base32hex: BASE32_HEX_ALPHABET,
  base64: BASE64_ALPHABET,
  base64url: BASE64_URL_ALPHABET,
  base256: BASE256_ALPHABET,
  base512: BASE512_ALPHABET,
  base1024: BASE1024_ALPHABET,
  base2048: BASE2048_ALPHABET,
  base4096: BASE4096_ALPHABET,
} as const;

export type AlphabetName = keyof typeof ALPHABETS;

export function isAlphabetName(name: string): name is AlphabetName {
  return Object.prototype.hasOwnProperty.call(ALPHABETS, name);
}

export const ALPHABET_NAMES: readonly AlphabetName[] = Object.keys(ALPHABETS).filter(isAlphabetName);

/**
 * Build a codec over a registered alphabet.
 *
 * @example
 * ```typescript
 * createCodec("base32").encode(new TextEncoder().encode("Hello"));
 * // => 'JBSWY3DP'
 * ```
 */
export function createCodec(name: AlphabetName, options: BaseNOptions = {}): BaseN {
  return new BaseN(ALPHABETS[name], options);
}
