import type { ByteOrder } from "@bytewise/codec"
import type { BytesTransformer } from "../../ports/transformer"
import { BoundsViolationError } from "../errors"

export type ShiftDirection = "left" | "right"

/**
 * Shifts the whole buffer as one number by `count` bits, keeping its length.
 * Bits pushed past the end are dropped, vacated bits are zero.
 *
 * The byte order decides which end is most significant: for big-endian a
 * left shift moves bits towards index 0, for little-endian towards the last
 * index.
 */
export class ShiftTransformer implements BytesTransformer {
  readonly name: `shift-${ShiftDirection}`

  constructor(
    readonly count: number,
    readonly direction: ShiftDirection,
    readonly byteOrder: ByteOrder = "big-endian",
  ) {
    if (!Number.isInteger(count) || count < 0) {
      throw new BoundsViolationError(count, Number.POSITIVE_INFINITY, "shift count")
    }
    this.name = `shift-${direction}`
  }

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    const out = inPlace ? buffer : buffer.slice()
    const towardsStart = (this.direction === "left") === (this.byteOrder === "big-endian")

    if (this.direction === "left") {
      shiftLeft(out, this.count, towardsStart)
    } else {
      shiftRight(out, this.count, towardsStart)
    }
    return out
  }

  supportsInPlace(): boolean {
    return true
  }
}

// Bytes move towards index 0 when `towardsStart`, otherwise towards the last
// index. Both loops start at the receiving end, so every source byte is read
// before it is overwritten.

function shiftLeft(bytes: Uint8Array, count: number, towardsStart: boolean): void {
  const shiftMod = count % 8
  const carryMask = (1 << shiftMod) - 1
  const offsetBytes = Math.floor(count / 8)
  const step = towardsStart ? 1 : -1
  const last = bytes.length - 1

  for (let n = 0; n < bytes.length; n++) {
    const i = towardsStart ? n : last - n
    const source = i + step * offsetBytes

    if (source < 0 || source > last) {
      bytes[i] = 0
      continue
    }

    let value = (bytes[source] << shiftMod) & 0xff
    const next = source + step
    if (next >= 0 && next <= last) {
      value |= (bytes[next] >>> (8 - shiftMod)) & carryMask
    }
    bytes[i] = value
  }
}

function shiftRight(bytes: Uint8Array, count: number, towardsStart: boolean): void {
  const shiftMod = count % 8
  const carryMask = (0xff << (8 - shiftMod)) & 0xff
  const offsetBytes = Math.floor(count / 8)
  const step = towardsStart ? 1 : -1
  const last = bytes.length - 1

  for (let n = 0; n < bytes.length; n++) {
    const i = towardsStart ? n : last - n
    const source = i + step * offsetBytes

    if (source < 0 || source > last) {
      bytes[i] = 0
      continue
    }

    let value = bytes[source] >>> shiftMod
    const previous = source + step
    if (previous >= 0 && previous <= last) {
      value |= (bytes[previous] << (8 - shiftMod)) & carryMask
    }
    bytes[i] = value
  }
}
