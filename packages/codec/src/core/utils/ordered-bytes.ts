import type { ByteOrder } from "../../ports/byte-order"

/**
 * Returns `bytes` as an encoder should walk them: unchanged for big-endian,
 * a reversed copy for little-endian. The input is never modified.
 */
export function orderedBytes(bytes: Uint8Array, byteOrder: ByteOrder): Uint8Array {
  return byteOrder === "little-endian" ? bytes.slice().reverse() : bytes
}
