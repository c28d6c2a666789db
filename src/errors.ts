/**
 * Error types raised by {@link BaseN}.
 *
 * Construction problems surface as {@link InvalidAlphabetError}; decode
 * problems as {@link InvalidInputError}. Both extend {@link BaseNError} so
 * callers can catch every codec failure with one `instanceof` check.
 */

/**
 * Root of the codec error hierarchy.
 */
export class BaseNError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type InvalidAlphabetReason =
  | "invalid-symbol"
  | "not-power-of-two"
  | "duplicate-symbol"
  | "separator-collision";

/**
 * The alphabet or separator passed to the constructor cannot form a codec.
 */
export class InvalidAlphabetError extends BaseNError {
  readonly reason: InvalidAlphabetReason;
  /** The offending symbol, when one symbol is to blame. */
  readonly symbol: string | undefined;
  /** Index of the offending symbol in the alphabet. */
  readonly index: number | undefined;

  constructor(
    reason: InvalidAlphabetReason,
    message: string,
    details: { symbol?: string; index?: number } = {}
  ) {
    super(message);
    this.reason = reason;
    this.symbol = details.symbol;
    this.index = details.index;
  }
}

export type InvalidInputReason =
  | "unknown-symbol"
  | "misplaced-padding"
  | "misplaced-separator"
  | "invalid-length"
  | "invalid-padding"
  | "non-zero-trailing-bits";

/**
 * Text handed to `decode` is not something the codec could have produced.
 */
export class InvalidInputError extends BaseNError {
  readonly reason: InvalidInputReason;
  /** UTF-16 offset into the decoded text. */
  readonly position: number;
  readonly symbol: string | undefined;

  constructor(
    reason: InvalidInputReason,
    message: string,
    position: number,
    symbol?: string
  ) {
    super(message);
    this.reason = reason;
    this.position = position;
    this.symbol = symbol;
  }
}
