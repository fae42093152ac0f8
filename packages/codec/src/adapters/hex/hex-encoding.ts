import { InvalidSymbolError } from "../../core/errors"
import type { ByteOrder } from "../../ports/byte-order"
import type { BinaryToTextEncoding } from "../../ports/encoding"

const LOWER_DIGITS = "0123456789abcdef"
const UPPER_DIGITS = "0123456789ABCDEF"
const PREFIX = "0x"

// ASCII '0'-'9' (48-57), 'A'-'F' (65-70), 'a'-'f' (97-102)
const NIBBLES = (() => {
  const lut = new Int8Array(128).fill(-1)
  for (let i = 0; i < 10; i++) lut[48 + i] = i
  for (let i = 0; i < 6; i++) lut[65 + i] = 10 + i
  for (let i = 0; i < 6; i++) lut[97 + i] = 10 + i
  return lut
})()

export type HexEncodingOptions = {
  /** Emit `A-F` instead of `a-f`. Decoding accepts both. Default: false */
  upperCase?: boolean
}

/**
 * Base16 with a hand-rolled nibble table.
 *
 * Decoding accepts an optional `0x` prefix and reads an odd number of digits
 * as if a `0` preceded them, so `"0xabc"` is `[0x0a, 0xbc]`.
 */
export class HexEncoding implements BinaryToTextEncoding {
  readonly name = "hex"
  readonly upperCase: boolean

  private readonly digits: string

  constructor(options: HexEncodingOptions = {}) {
    this.upperCase = options.upperCase ?? false
    this.digits = this.upperCase ? UPPER_DIGITS : LOWER_DIGITS
  }

  encode(bytes: Uint8Array, byteOrder: ByteOrder = "big-endian"): string {
    const out = new Array<string>(bytes.length * 2)
    const last = bytes.length - 1

    for (let i = 0; i < bytes.length; i++) {
      const byte = bytes[byteOrder === "big-endian" ? i : last - i] ?? 0
      out[2 * i] = this.digits.charAt(byte >> 4)
      out[2 * i + 1] = this.digits.charAt(byte & 0x0f)
    }

    return out.join("")
  }

  decode(text: string): Uint8Array {
    const start = text.startsWith(PREFIX) ? PREFIX.length : 0
    const digitCount = text.length - start
    const leadingZero = digitCount % 2
    const out = new Uint8Array((digitCount + leadingZero) / 2)

    for (let i = start; i < text.length; i++) {
      const code = text.charCodeAt(i)
      const nibble = code < 128 ? (NIBBLES[code] ?? -1) : -1

      if (nibble < 0) {
        throw new InvalidSymbolError(text.charAt(i), i, this.name)
      }

      const position = i - start + leadingZero
      if (position % 2 === 0) {
        out[position >> 1] = nibble << 4
      } else {
        out[position >> 1] |= nibble
      }
    }

    return out
  }
}
