import type { ByteOrder } from "../ports/byte-order"
import type { BinaryToTextEncoding } from "../ports/encoding"
import { type Alphabet, NOT_A_SYMBOL } from "./alphabet"
import { InvalidAlphabetError, InvalidSymbolError } from "./errors"
import { orderedBytes } from "./utils/ordered-bytes"

export type BaseEncodingOptions = {
  /**
   * Symbol that fills a final partial chunk up to `charsPerChunk` symbols.
   * Trailing padding is always stripped before decoding.
   */
  padding?: string

  /** Keep accepting `padding` on decode, but do not emit it on encode. */
  omitPadding?: boolean
}

/**
 * Alphabet-driven chunked codec covering base32, base64 and any other
 * power-of-two alphabet.
 *
 * Bytes are consumed `bytesPerChunk` at a time and each chunk becomes up to
 * `charsPerChunk` symbols. A trailing partial chunk emits only the symbols
 * needed to hold its bits, optionally followed by padding.
 *
 * @remarks
 * The bit buffer is a `bigint` because a 7-bit alphabet packs 7 bytes, plus
 * one byte of headroom, per chunk.
 */
export class BaseEncoding implements BinaryToTextEncoding {
  readonly name: string
  readonly padding: string | undefined

  private readonly emitPadding: boolean

  constructor(
    readonly alphabet: Alphabet,
    options: BaseEncodingOptions = {},
  ) {
    this.name = alphabet.name
    this.padding = options.padding
    this.emitPadding = options.padding !== undefined && options.omitPadding !== true

    if (this.padding !== undefined && (this.padding.length !== 1 || alphabet.has(this.padding))) {
      throw new InvalidAlphabetError(
        `Padding must be a single character outside the ${alphabet.name} alphabet`,
        { alphabet: alphabet.name, symbol: this.padding },
      )
    }
  }

  /** Upper bound of the encoded length of `byteCount` bytes. */
  maxEncodedSize(byteCount: number): number {
    return this.alphabet.charsPerChunk * Math.ceil(byteCount / this.alphabet.bytesPerChunk)
  }

  /** Upper bound of the decoded length of `charCount` symbols. */
  maxDecodedSize(charCount: number): number {
    return Math.ceil((this.alphabet.bitsPerChar * charCount) / 8)
  }

  encode(bytes: Uint8Array, byteOrder: ByteOrder = "big-endian"): string {
    const source = orderedBytes(bytes, byteOrder)
    const { bytesPerChunk } = this.alphabet
    const out: string[] = []

    for (let i = 0; i < source.length; i += bytesPerChunk) {
      this.encodeChunk(out, source, i, Math.min(bytesPerChunk, source.length - i))
    }

    return out.join("")
  }

  decode(text: string): Uint8Array {
    const chars = this.trimTrailingPadding(text)
    const { bitsPerChar, bytesPerChunk, charsPerChunk } = this.alphabet
    const bits = BigInt(bitsPerChar)
    const out = new Uint8Array(this.maxDecodedSize(chars.length))
    let written = 0

    for (let charIdx = 0; charIdx < chars.length; charIdx += charsPerChunk) {
      let chunk = 0n
      let charsProcessed = 0

      for (let i = 0; i < charsPerChunk; i++) {
        chunk <<= bits
        if (charIdx + i < chars.length) {
          chunk |= BigInt(this.symbolAt(chars, charIdx + i))
          charsProcessed++
        }
      }

      const minOffset = bytesPerChunk * 8 - charsProcessed * bitsPerChar
      for (let offset = (bytesPerChunk - 1) * 8; offset >= minOffset; offset -= 8) {
        out[written++] = Number((chunk >> BigInt(offset)) & 0xffn)
      }
    }

    return written === out.length ? out : out.slice(0, written)
  }

  private encodeChunk(out: string[], bytes: Uint8Array, off: number, len: number): void {
    const { bitsPerChar, bytesPerChunk, mask } = this.alphabet
    let bitBuffer = 0n

    for (let i = 0; i < len; i++) {
      bitBuffer = (bitBuffer | BigInt(bytes[off + i] ?? 0)) << 8n
    }

    // position of the first symbol: buffer width minus one symbol
    const bitOffset = (len + 1) * 8 - bitsPerChar
    const bigMask = BigInt(mask)
    let bitsProcessed = 0

    while (bitsProcessed < len * 8) {
      const index = (bitBuffer >> BigInt(bitOffset - bitsProcessed)) & bigMask
      out.push(this.alphabet.encode(Number(index)))
      bitsProcessed += bitsPerChar
    }

    if (this.emitPadding && this.padding !== undefined) {
      while (bitsProcessed < bytesPerChunk * 8) {
        out.push(this.padding)
        bitsProcessed += bitsPerChar
      }
    }
  }

  private symbolAt(chars: string, index: number): number {
    const value = this.alphabet.decodeCode(chars.charCodeAt(index))

    if (value === NOT_A_SYMBOL) {
      throw new InvalidSymbolError(chars.charAt(index), index, this.name)
    }
    return value
  }

  private trimTrailingPadding(text: string): string {
    if (this.padding === undefined) return text

    let end = text.length
    while (end > 0 && text.charAt(end - 1) === this.padding) end--

    return text.slice(0, end)
  }
}
