import type { RandomSource } from "../../ports/random-source"
import type { BytesTransformer } from "../../ports/transformer"

/** Fisher–Yates shuffle driven by `random`. */
export class ShuffleTransformer implements BytesTransformer {
  readonly name = "shuffle"

  constructor(private readonly random: RandomSource) {}

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    const out = inPlace ? buffer : buffer.slice()

    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.random.next() * (i + 1))
      const tmp = out[i]
      out[i] = out[j]
      out[j] = tmp
    }
    return out
  }

  supportsInPlace(): boolean {
    return true
  }
}
