/**
 * base-n - Encode bytes as text with any power-of-two alphabet
 */

export type { Codec } from "./codec.js";
export { BaseN, type Alphabet, type BaseNOptions } from "./base-n.js";
export {
  BaseNError,
  InvalidAlphabetError,
  InvalidInputError,
  type InvalidAlphabetReason,
  type InvalidInputReason,
} from "./errors.js";
export {
  ALPHABETS,
  ALPHABET_NAMES,
  BASE2_ALPHABET,
  BASE4_ALPHABET,
  BASE8_ALPHABET,
  BASE16_ALPHABET,
  BASE32_ALPHABET,
  BASE32_HEX_ALPHABET,
  BASE64_ALPHABET,
  BASE64_URL_ALPHABET,
  BASE256_ALPHABET,
  BASE512_ALPHABET,
  BASE1024_ALPHABET,
  BASE2048_ALPHABET,
  BASE4096_ALPHABET,
  createCodec,
  isAlphabetName,
  type AlphabetName,
} from "./alphabets.js";
export { gcd, isPowerOfTwo, lcm, log2PowerOfTwo, symbolsPerBlock } from "./bits.js";
