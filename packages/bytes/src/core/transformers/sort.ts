import type { BytesTransformer } from "../../ports/transformer"

export type ByteComparator = (a: number, b: number) => number

/**
 * Sorts ascending by unsigned value, or by `comparator`. Only the natural
 * order runs in place.
 */
export class SortTransformer implements BytesTransformer {
  readonly name = "sort"

  constructor(private readonly comparator?: ByteComparator) {}

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    if (this.comparator === undefined) {
      return (inPlace ? buffer : buffer.slice()).sort()
    }
    return buffer.slice().sort(this.comparator)
  }

  supportsInPlace(): boolean {
    return this.comparator === undefined
  }
}
