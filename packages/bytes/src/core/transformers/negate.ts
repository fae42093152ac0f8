import type { BytesTransformer } from "../../ports/transformer"

export class NegateTransformer implements BytesTransformer {
  readonly name = "not"

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    const out = inPlace ? buffer : buffer.slice()
    for (let i = 0; i < out.length; i++) out[i] = ~out[i]
    return out
  }

  supportsInPlace(): boolean {
    return true
  }
}
