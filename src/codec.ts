/**
 * Base codec interface for converting bytes to text and back.
 */
export interface Codec {
  /**
   * Encode bytes as text.
   * @param data - The bytes to encode
   * @returns The encoded text
   */
  encode(data: Uint8Array): string;

  /**
   * Decode text produced by {@link Codec.encode}.
   * @param text - The text to decode
   * @returns The decoded bytes
   */
  decode(text: string): Uint8Array;
}
