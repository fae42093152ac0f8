import type { BytesTransformer } from "../../ports/transformer"
import { BoundsViolationError } from "../errors"

/**
 * - `keep-from-max-length`: keep the trailing bytes, so the numeric value of
 *   a big-endian buffer survives growing; zero bytes are added on the left.
 * - `keep-from-zero-index`: keep the leading bytes; zero bytes are added on
 *   the right.
 */
export type ResizeMode = "keep-from-max-length" | "keep-from-zero-index"

export class ResizeTransformer implements BytesTransformer {
  readonly name = "resize"

  constructor(
    readonly size: number,
    readonly mode: ResizeMode = "keep-from-max-length",
  ) {
    if (!Number.isInteger(size) || size < 0) {
      throw new BoundsViolationError(size, Number.POSITIVE_INFINITY, "size")
    }
  }

  apply(buffer: Uint8Array, _inPlace: boolean): Uint8Array {
    const out = new Uint8Array(this.size)
    const kept = Math.min(this.size, buffer.length)

    if (this.mode === "keep-from-zero-index") {
      out.set(buffer.subarray(0, kept))
    } else {
      out.set(buffer.subarray(buffer.length - kept), this.size - kept)
    }
    return out
  }

  supportsInPlace(): boolean {
    return false
  }
}
