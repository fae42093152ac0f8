import type { ByteOrder } from "./byte-order"

/**
 * Turns bytes into text.
 *
 * @remarks
 * Encoders are pure and stateless: the same bytes and byte order always give
 * the same text, and the input buffer is never written to.
 */
export interface Encoder {
  /** Short identifier used in logs and error context, e.g. `"base64"`. */
  readonly name: string

  /**
   * Encode `bytes`, walking them in `byteOrder` (a little-endian buffer is
   * read from its last byte to its first).
   */
  encode(bytes: Uint8Array, byteOrder?: ByteOrder): string
}

/**
 * Turns text back into bytes.
 */
export interface Decoder {
  readonly name: string

  /**
   * Decode `text` into a freshly allocated big-endian buffer.
   *
   * @throws InvalidSymbolError for a character outside the encoding's alphabet
   */
  decode(text: string): Uint8Array
}

/**
 * A bidirectional binary-to-text encoding.
 *
 * @see https://en.wikipedia.org/wiki/Binary-to-text_encoding
 */
export interface BinaryToTextEncoding extends Encoder, Decoder {}
