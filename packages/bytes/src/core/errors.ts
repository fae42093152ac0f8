import { BaseError } from "@bytewise/errors"
import type { Variant } from "../ports/variant"

/** A variant refused an operation, e.g. `array()` on a read-only sequence. */
export class AccessViolationError extends BaseError<"access_violation"> {
  constructor(variant: Variant, operation: string) {
    super(`${operation} is not allowed on a ${variant} byte sequence`, {
      code: "access_violation",
      context: { variant, operation },
    })
  }
}

/** An index, offset or size fell outside `[0, bound)`. */
export class BoundsViolationError extends BaseError<"bounds_violation"> {
  constructor(index: number, bound: number, what = "index") {
    super(`${what} ${index} out of bounds [0, ${bound})`, {
      code: "bounds_violation",
      context: { index, bound },
    })
  }
}

export class LengthMismatchError extends BaseError<"length_mismatch"> {
  constructor(expected: number, actual: number) {
    super(`Expected a buffer of length ${expected}, got ${actual}`, {
      code: "length_mismatch",
      context: { expected, actual },
    })
  }
}

/**
 * A transformer returned the input buffer when asked to copy, or a new buffer
 * when asked to work in place. This is a bug in the transformer.
 */
export class TransformContractError extends BaseError<"transform_contract_violation"> {
  constructor(transformer: string, inPlace: boolean) {
    super(
      inPlace
        ? `Transformer '${transformer}' was asked to work in place but returned a new buffer`
        : `Transformer '${transformer}' was asked to copy but returned its input buffer`,
      {
        code: "transform_contract_violation",
        context: { transformer, inPlace },
        isOperational: false,
      },
    )
  }
}
