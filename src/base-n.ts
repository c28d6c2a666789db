import type { Codec } from "./codec.js";
import {
  BITS_PER_BYTE,
  isPowerOfTwo,
  log2PowerOfTwo,
  symbolsPerBlock,
} from "./bits.js";
import { InvalidAlphabetError, InvalidInputError } from "./errors.js";

/**
 * An alphabet is either a string, split into code points, or an array of
 * single-code-point strings. The last symbol is the padding symbol.
 */
export type Alphabet = string | readonly string[];

/**
 * Options for {@link BaseN}
 */
export interface BaseNOptions {
  /**
   * Inserted between adjacent output symbols. An empty string means no
   * separator. None of its code points may appear in the alphabet.
   */
  separator?: string;

  /**
   * If true (default), `decode` only accepts canonical output: exact
   * padding, a separator between every pair of symbols and nowhere else,
   * and zero bits in the final group's unused tail. If false, padding may
   * be omitted, separators are dropped wherever they appear, and unused
   * tail bits are ignored.
   */
  strict?: boolean;
}

const BYTE_MASK = 0xff;

/**
 * Base-N codec over any power-of-two alphabet.
 *
 * Bytes are read as one big-endian bit stream and regrouped into k-bit
 * values, where k = log2 of the data-symbol count. The output is padded
 * with the alphabet's last symbol up to a multiple of
 * lcm(k, 8) / k symbols, so the decoder can recover the exact byte count.
 *
 * @example
 * ```typescript
 * const base64 = new BaseN(BASE64_ALPHABET);
 * base64.encode(new TextEncoder().encode("Hello"));
 * // => 'SGVsbG8='
 *
 * const octal = new BaseN("01234567=", { separator: " " });
 * octal.encode(Uint8Array.of(0xff));
 * // => '7 7 6 = = = = ='
 * ```
 */
export class BaseN implements Codec {
  /** Data symbols; symbol i encodes the value i. */
  readonly symbols: readonly string[];
  readonly padding: string;
  readonly separator: string | undefined;
  readonly strict: boolean;
  readonly bitsPerSymbol: number;
  /** Output length is always a multiple of this many symbols. */
  readonly blockSize: number;

  private readonly values: ReadonlyMap<string, number>;

  /**
   * @throws InvalidAlphabetError if the alphabet or separator is unusable
   */
  constructor(alphabet: Alphabet, options: BaseNOptions = {}) {
    const all = typeof alphabet === "string" ? Array.from(alphabet) : [...alphabet];

    all.forEach((symbol, index) => {
      if (Array.from(symbol).length !== 1 || isLoneSurrogate(symbol)) {
        throw new InvalidAlphabetError(
          "invalid-symbol",
          `Alphabet symbol at index ${index} must be exactly one character, got ${JSON.stringify(symbol)}`,
          { symbol, index }
        );
      }
    });

    const dataCount = all.length - 1;
    if (dataCount < 2 || !isPowerOfTwo(dataCount)) {
      throw new InvalidAlphabetError(
        "not-power-of-two",
        `Alphabet must have a power-of-two number of data symbols (at least 2) plus one padding symbol; got ${Math.max(dataCount, 0)} data symbols`
      );
    }

    const seen = new Map<string, number>();
    all.forEach((symbol, index) => {
      const first = seen.get(symbol);
      if (first !== undefined) {
        throw new InvalidAlphabetError(
          "duplicate-symbol",
          `Alphabet symbol ${JSON.stringify(symbol)} appears at index ${first} and ${index}`,
          { symbol, index }
        );
      }
      seen.set(symbol, index);
    });

    const separator = options.separator === "" ? undefined : options.separator;
    if (separator !== undefined) {
      for (const char of separator) {
        if (isLoneSurrogate(char)) {
          throw new InvalidAlphabetError(
            "invalid-symbol",
            `Separator ${JSON.stringify(separator)} contains a lone surrogate ${JSON.stringify(char)}`,
            { symbol: char }
          );
        }
        const index = seen.get(char);
        if (index !== undefined) {
          throw new InvalidAlphabetError(
            "separator-collision",
            `Separator ${JSON.stringify(separator)} contains alphabet symbol ${JSON.stringify(char)}`,
            { symbol: char, index }
          );
        }
      }
    }

    this.symbols = Object.freeze(all.slice(0, dataCount));
    this.padding = all[dataCount];
    this.separator = separator;
    this.strict = options.strict ?? true;
    this.bitsPerSymbol = log2PowerOfTwo(dataCount);
    this.blockSize = symbolsPerBlock(this.bitsPerSymbol);
    this.values = new Map(this.symbols.map((symbol, value) => [symbol, value]));
  }

  /**
   * Encode bytes as padded base-N text.
   * @param data - Bytes to encode
   * @returns Encoded text; empty input gives an empty string
   */
  encode(data: Uint8Array): string {
    if (data.length === 0) {
      return "";
    }

    const k = this.bitsPerSymbol;
    const mask = (1 << k) - 1;
    const output: string[] = [];
    let buffer = 0;
    let bits = 0;

    for (const byte of data) {
      buffer = (buffer << BITS_PER_BYTE) | byte;
      bits += BITS_PER_BYTE;
      while (bits >= k) {
        bits -= k;
        output.push(this.symbols[(buffer >>> bits) & mask]);
      }
      // keep only the unread bits so the accumulator stays below k + 8 bits
      buffer &= (1 << bits) - 1;
    }

    if (bits > 0) {
      output.push(this.symbols[(buffer << (k - bits)) & mask]);
    }

    const paddingCount = this.paddingFor(output.length, data.length);
    for (let i = 0; i < paddingCount; i++) {
      output.push(this.padding);
    }

    return output.join(this.separator ?? "");
  }

  /**
   * Decode text produced by {@link BaseN.encode} with the same alphabet
   * and separator.
   *
   * @param text - Encoded text
   * @returns Decoded bytes; empty text gives an empty array
   * @throws InvalidInputError if the text is not valid for this codec
   */
  decode(text: string): Uint8Array {
    if (text.length === 0) {
      return new Uint8Array(0);
    }

    const { symbols, offsets } = this.tokenize(text);
    // only separators, which lenient decoding drops
    if (symbols.length === 0) {
      return new Uint8Array(0);
    }

    let dataCount = symbols.length;
    while (dataCount > 0 && symbols[dataCount - 1] === this.padding) {
      dataCount--;
    }
    const paddingCount = symbols.length - dataCount;

    if (dataCount === 0) {
      throw new InvalidInputError(
        "invalid-length",
        "Encoded text contains padding but no data symbols",
        0
      );
    }

    const values = new Uint32Array(dataCount);
    for (let i = 0; i < dataCount; i++) {
      const symbol = symbols[i];
      const value = this.values.get(symbol);
      if (value === undefined) {
        if (symbol === this.padding) {
          throw new InvalidInputError(
            "misplaced-padding",
            `Padding symbol ${JSON.stringify(symbol)} at position ${offsets[i]} is followed by data`,
            offsets[i],
            symbol
          );
        }
        throw new InvalidInputError(
          "unknown-symbol",
          `Unknown symbol ${JSON.stringify(symbol)} at position ${offsets[i]}`,
          offsets[i],
          symbol
        );
      }
      values[i] = value;
    }

    const k = this.bitsPerSymbol;
    const maxByteCount = Math.floor((dataCount * k) / BITS_PER_BYTE);
    if (Math.ceil((maxByteCount * BITS_PER_BYTE) / k) !== dataCount) {
      throw new InvalidInputError(
        "invalid-length",
        `${dataCount} data symbols of ${k} bits cannot come from a whole number of bytes`,
        offsets[dataCount - 1],
        symbols[dataCount - 1]
      );
    }

    let byteCount = maxByteCount;
    if (this.strict || paddingCount > 0) {
      const alignment = (this.blockSize - (dataCount % this.blockSize)) % this.blockSize;
      const extra = paddingCount - alignment;
      byteCount = maxByteCount - extra / this.blockSize;
      if (
        extra < 0 ||
        extra % this.blockSize !== 0 ||
        Math.ceil((byteCount * BITS_PER_BYTE) / k) !== dataCount
      ) {
        throw new InvalidInputError(
          "invalid-padding",
          `${paddingCount} padding symbols do not fit ${dataCount} data symbols`,
          paddingCount > 0 ? offsets[dataCount] : text.length
        );
      }
    }

    const output = new Uint8Array(byteCount);
    let outputIndex = 0;
    let buffer = 0;
    let bits = 0;
    // bits of the final group that belong to no output byte
    let tail = 0;

    for (const value of values) {
      buffer = (buffer << k) | value;
      bits += k;
      while (bits >= BITS_PER_BYTE) {
        bits -= BITS_PER_BYTE;
        const byte = (buffer >>> bits) & BYTE_MASK;
        if (outputIndex < byteCount) {
          output[outputIndex++] = byte;
        } else {
          tail |= byte;
        }
      }
      buffer &= (1 << bits) - 1;
    }
    tail |= buffer;

    if (this.strict && tail !== 0) {
      throw new InvalidInputError(
        "non-zero-trailing-bits",
        `Final symbol ${JSON.stringify(symbols[dataCount - 1])} at position ${offsets[dataCount - 1]} sets bits beyond the last byte`,
        offsets[dataCount - 1],
        symbols[dataCount - 1]
      );
    }

    return output;
  }

  /**
   * Number of padding symbols after `dataCount` data symbols encoding
   * `byteCount` bytes.
   *
   * Padding first fills the last block. When a symbol is wider than a
   * byte, the zero-extended final group can hold whole bytes that were
   * never in the input; one further block of padding marks each of them,
   * since the data-symbol count alone cannot tell those lengths apart.
   */
  private paddingFor(dataCount: number, byteCount: number): number {
    const alignment = (this.blockSize - (dataCount % this.blockSize)) % this.blockSize;
    const phantomBytes =
      Math.floor((dataCount * this.bitsPerSymbol) / BITS_PER_BYTE) - byteCount;
    return alignment + phantomBytes * this.blockSize;
  }

  /**
   * Split text into symbols, handling separators, and record where each
   * symbol starts in the input string.
   */
  private tokenize(text: string): { symbols: string[]; offsets: number[] } {
    const symbols: string[] = [];
    const offsets: number[] = [];
    const separator = this.separator;

    let i = 0;
    while (i < text.length) {
      if (separator !== undefined && text.startsWith(separator, i)) {
        // In strict mode separators are consumed right after a symbol,
        // so reaching one here means it is leading or doubled.
        if (this.strict) {
          throw misplacedSeparator(i);
        }
        i += separator.length;
        continue;
      }

      const codePoint = text.codePointAt(i);
      if (codePoint === undefined) {
        break;
      }
      const symbol = String.fromCodePoint(codePoint);
      symbols.push(symbol);
      offsets.push(i);
      i += symbol.length;

      if (separator !== undefined && this.strict && i < text.length) {
        if (!text.startsWith(separator, i)) {
          throw misplacedSeparator(i);
        }
        i += separator.length;
        if (i === text.length) {
          throw misplacedSeparator(i - separator.length);
        }
      }
    }

    return { symbols, offsets };
  }
}

// A lone surrogate can pair up with a neighbouring half into one character.
function isLoneSurrogate(symbol: string): boolean {
  const codePoint = symbol.codePointAt(0);
  return codePoint !== undefined && codePoint >= 0xd800 && codePoint <= 0xdfff;
}

function misplacedSeparator(position: number): InvalidInputError {
  return new InvalidInputError(
    "misplaced-separator",
    `Expected exactly one separator between symbols at position ${position}`,
    position
  );
}
