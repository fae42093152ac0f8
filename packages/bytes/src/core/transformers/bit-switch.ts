import type { BytesTransformer } from "../../ports/transformer"
import { BoundsViolationError } from "../errors"

/**
 * Sets, clears or (with no `value`) toggles one bit. Bit 0 is the least
 * significant bit of the last byte.
 */
export class BitSwitchTransformer implements BytesTransformer {
  readonly name = "switch-bit"

  constructor(
    readonly position: number,
    readonly value?: boolean,
  ) {}

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    const bitLength = buffer.length * 8
    if (!Number.isInteger(this.position) || this.position < 0 || this.position >= bitLength) {
      throw new BoundsViolationError(this.position, bitLength, "bit position")
    }

    const out = inPlace ? buffer : buffer.slice()
    const index = out.length - 1 - Math.floor(this.position / 8)
    const mask = 1 << this.position % 8

    if (this.value === undefined) {
      out[index] ^= mask
    } else if (this.value) {
      out[index] |= mask
    } else {
      out[index] &= ~mask
    }
    return out
  }

  supportsInPlace(): boolean {
    return true
  }
}
