export type { ByteOrder } from "./ports/byte-order"
export { byteOrders } from "./ports/byte-order"
export type { BinaryToTextEncoding, Decoder, Encoder } from "./ports/encoding"

export type { AlphabetOptions } from "./core/alphabet"
export { Alphabet, NOT_A_SYMBOL } from "./core/alphabet"
export { BASE32_CROCKFORD, BASE32_RFC4648, BASE64_STANDARD, BASE64_URL_SAFE } from "./core/alphabets"
export type { BaseEncodingOptions } from "./core/base-encoding"
export { BaseEncoding } from "./core/base-encoding"
export type { Base64Options } from "./core/encodings"
export { encodings } from "./core/encodings"
export { InvalidAlphabetError, InvalidRadixError, InvalidSymbolError } from "./core/errors"
export { orderedBytes } from "./core/utils/ordered-bytes"

export type { HexEncodingOptions } from "./adapters/hex/hex-encoding"
export { HexEncoding } from "./adapters/hex/hex-encoding"
export { MAX_RADIX, MIN_RADIX, RadixEncoding } from "./adapters/radix/radix-encoding"
