import { HexEncoding } from "../adapters/hex/hex-encoding"
import { RadixEncoding } from "../adapters/radix/radix-encoding"
import { BASE32_CROCKFORD, BASE32_RFC4648, BASE64_STANDARD, BASE64_URL_SAFE } from "./alphabets"
import { BaseEncoding } from "./base-encoding"

const PADDING = "="

export type Base64Options = {
  /** Use `-` and `_` instead of `+` and `/`. Default: false */
  urlSafe?: boolean
  /** Emit trailing `=`. Default: true */
  padding?: boolean
}

/**
 * Ready-made encodings.
 *
 * @example
 * ```ts
 * encodings.base64().encode(new Uint8Array([0x4a, 0x94])) // "SpQ="
 * encodings.hex(true).encode(new Uint8Array([0xab]))       // "AB"
 * ```
 */
export const encodings = {
  hex(upperCase = false): HexEncoding {
    return new HexEncoding({ upperCase })
  },

  /** RFC 4648 base32 with `=` padding. */
  base32(): BaseEncoding {
    return new BaseEncoding(BASE32_RFC4648, { padding: PADDING })
  },

  /** Crockford base32, unpadded. */
  base32Crockford(): BaseEncoding {
    return new BaseEncoding(BASE32_CROCKFORD)
  },

  base64({ urlSafe = false, padding = true }: Base64Options = {}): BaseEncoding {
    return new BaseEncoding(urlSafe ? BASE64_URL_SAFE : BASE64_STANDARD, {
      padding: PADDING,
      omitPadding: !padding,
    })
  },

  base64Url(): BaseEncoding {
    return encodings.base64({ urlSafe: true })
  },

  radix(radix: number): RadixEncoding {
    return new RadixEncoding(radix)
  },

  binary(): RadixEncoding {
    return new RadixEncoding(2)
  },

  octal(): RadixEncoding {
    return new RadixEncoding(8)
  },

  decimal(): RadixEncoding {
    return new RadixEncoding(10)
  },

  base36(): RadixEncoding {
    return new RadixEncoding(36)
  },
}
