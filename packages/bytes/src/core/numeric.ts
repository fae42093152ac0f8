import type { ByteOrder } from "@bytewise/codec"

/** Fixed-width numbers a sequence can be built from or read as. */
export type NumberKind = "short" | "int" | "float" | "double"

/** Width in bytes; `long` is the 64-bit integer, read as a `bigint`. */
export const numberWidths = { short: 2, int: 4, long: 8, float: 4, double: 8 } as const

function dataView(buffer: Uint8Array): DataView {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
}

const isLittleEndian = (byteOrder: ByteOrder) => byteOrder === "little-endian"

/**
 * `value` as a signed two's complement integer or IEEE 754 float. Integers
 * outside the kind's range wrap the way `DataView` setters do.
 */
export function encodeNumber(kind: NumberKind, value: number, byteOrder: ByteOrder): Uint8Array {
  const buffer = new Uint8Array(numberWidths[kind])
  const view = dataView(buffer)
  const le = isLittleEndian(byteOrder)

  switch (kind) {
    case "short":
      view.setInt16(0, value, le)
      break
    case "int":
      view.setInt32(0, value, le)
      break
    case "float":
      view.setFloat32(0, value, le)
      break
    case "double":
      view.setFloat64(0, value, le)
      break
  }
  return buffer
}

export function encodeLong(value: bigint, byteOrder: ByteOrder): Uint8Array {
  const buffer = new Uint8Array(numberWidths.long)
  dataView(buffer).setBigInt64(0, value, isLittleEndian(byteOrder))
  return buffer
}

/** Reads `kind` at `offset`; the caller checks that it fits. */
export function decodeNumber(
  kind: NumberKind,
  buffer: Uint8Array,
  offset: number,
  byteOrder: ByteOrder,
): number {
  const view = dataView(buffer)
  const le = isLittleEndian(byteOrder)

  switch (kind) {
    case "short":
      return view.getInt16(offset, le)
    case "int":
      return view.getInt32(offset, le)
    case "float":
      return view.getFloat32(offset, le)
    case "double":
      return view.getFloat64(offset, le)
  }
}

export function decodeLong(buffer: Uint8Array, offset: number, byteOrder: ByteOrder): bigint {
  return dataView(buffer).getBigInt64(offset, isLittleEndian(byteOrder))
}

/** Shannon entropy of the byte values in bits per byte, `0..8`. */
export function shannonEntropy(buffer: Uint8Array): number {
  if (buffer.length === 0) return 0

  const counts = new Uint32Array(256)
  for (const byte of buffer) counts[byte]++

  let entropy = 0
  for (const count of counts) {
    if (count === 0) continue
    const p = count / buffer.length
    entropy -= p * Math.log2(p)
  }
  return entropy
}
