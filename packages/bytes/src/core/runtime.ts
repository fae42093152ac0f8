import type { ByteOrder } from "@bytewise/codec"
import { type Logger, NullLogger } from "@bytewise/logger"

export type BytesDefaults = Readonly<{
  /** Byte order of sequences built by `allocate`, `wrap` and `from`. */
  byteOrder: ByteOrder
  /** Case used by `encodeHex()` when none is given. */
  hexUpperCase: boolean
}>

/**
 * Collaborators every byte sequence carries and hands on to the sequences
 * derived from it.
 */
export type BytesRuntime = Readonly<{
  logger: Logger
  defaults: BytesDefaults
}>

export const defaultBytesRuntime: BytesRuntime = Object.freeze({
  logger: new NullLogger(),
  defaults: Object.freeze({ byteOrder: "big-endian", hexUpperCase: false }),
})
