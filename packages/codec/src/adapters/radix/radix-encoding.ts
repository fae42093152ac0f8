import { InvalidRadixError, InvalidSymbolError } from "../../core/errors"
import { orderedBytes } from "../../core/utils/ordered-bytes"
import type { ByteOrder } from "../../ports/byte-order"
import type { BinaryToTextEncoding } from "../../ports/encoding"
import { HexEncoding } from "../hex/hex-encoding"

export const MIN_RADIX = 2
export const MAX_RADIX = 36

const magnitudeHex = new HexEncoding()

/**
 * Renders the whole buffer as one unsigned number in base 2 to 36, with the
 * digits `0-9a-z`.
 *
 * @remarks
 * This is a numeric encoding, not a byte encoding: leading zero bytes carry no
 * value and are lost, so `[0x00, 0x01]` decodes back to `[0x01]` and a zero
 * value decodes to an empty buffer. Use it for numbers, never for opaque data
 * that must survive a round trip at its exact length.
 */
export class RadixEncoding implements BinaryToTextEncoding {
  readonly name: string

  constructor(readonly radix: number) {
    if (!Number.isInteger(radix) || radix < MIN_RADIX || radix > MAX_RADIX) {
      throw new InvalidRadixError(radix, MIN_RADIX, MAX_RADIX)
    }
    this.name = `radix-${radix}`
  }

  encode(bytes: Uint8Array, byteOrder: ByteOrder = "big-endian"): string {
    if (bytes.length === 0) return ""

    let value = 0n
    for (const byte of orderedBytes(bytes, byteOrder)) {
      value = (value << 8n) | BigInt(byte)
    }

    return value.toString(this.radix)
  }

  decode(text: string): Uint8Array {
    const base = BigInt(this.radix)
    let value = 0n

    for (let i = 0; i < text.length; i++) {
      const digit = Number.parseInt(text.charAt(i), 36)

      if (Number.isNaN(digit) || digit >= this.radix) {
        throw new InvalidSymbolError(text.charAt(i), i, this.name)
      }
      value = value * base + BigInt(digit)
    }

    // minimal big-endian magnitude: no sign byte, and zero has no bytes at all
    return value === 0n ? new Uint8Array(0) : magnitudeHex.decode(value.toString(16))
  }
}
