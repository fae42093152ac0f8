import type { BytesTransformer } from "../../ports/transformer"

export class ConcatTransformer implements BytesTransformer {
  readonly name = "concat"

  private readonly parts: readonly Uint8Array[]

  constructor(...parts: Uint8Array[]) {
    this.parts = parts
  }

  apply(buffer: Uint8Array, _inPlace: boolean): Uint8Array {
    return concatBuffers([buffer, ...this.parts])
  }

  supportsInPlace(): boolean {
    return false
  }
}

export function concatBuffers(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0
  for (const part of parts) total += part.length

  const out = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}
