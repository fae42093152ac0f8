import type { BytesTransformer } from "../../ports/transformer"
import { LengthMismatchError } from "../errors"

export type BitwiseOperator = "and" | "or" | "xor"

function combine(operator: BitwiseOperator, a: number, b: number): number {
  switch (operator) {
    case "and":
      return a & b
    case "or":
      return a | b
    case "xor":
      return a ^ b
  }
}

/** Element-wise `and`, `or` or `xor` with an operand of the same length. */
export class BitwiseTransformer implements BytesTransformer {
  readonly name: BitwiseOperator

  private readonly operand: Uint8Array

  constructor(operand: Uint8Array, operator: BitwiseOperator) {
    // snapshot, so `x.xor(x)` reads the operand before it is overwritten
    this.operand = operand.slice()
    this.name = operator
  }

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array {
    if (buffer.length !== this.operand.length) {
      throw new LengthMismatchError(buffer.length, this.operand.length)
    }

    const out = inPlace ? buffer : buffer.slice()
    for (let i = 0; i < out.length; i++) {
      out[i] = combine(this.name, out[i], this.operand[i])
    }
    return out
  }

  supportsInPlace(): boolean {
    return true
  }
}
