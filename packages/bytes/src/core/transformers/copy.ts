import type { BytesTransformer } from "../../ports/transformer"
import { BoundsViolationError } from "../errors"

/** Copies `length` bytes starting at `offset`. */
export class CopyTransformer implements BytesTransformer {
  readonly name = "copy"

  constructor(
    readonly offset: number,
    readonly length: number,
  ) {}

  apply(buffer: Uint8Array, _inPlace: boolean): Uint8Array {
    const end = this.offset + this.length

    if (!Number.isInteger(this.offset) || this.offset < 0 || this.offset > buffer.length) {
      throw new BoundsViolationError(this.offset, buffer.length + 1, "offset")
    }
    if (!Number.isInteger(this.length) || this.length < 0 || end > buffer.length) {
      throw new BoundsViolationError(end, buffer.length + 1, "end")
    }

    return buffer.slice(this.offset, end)
  }

  supportsInPlace(): boolean {
    return false
  }
}
