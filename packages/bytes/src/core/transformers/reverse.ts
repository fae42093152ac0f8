import type { BytesTransformer } from "../../ports/transformer"

export class ReverseTransformer implements BytesTransformer {
  readonly name = "reverse"

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    return (inPlace ? buffer : buffer.slice()).reverse()
  }

  supportsInPlace(): boolean {
    return true
  }
}
