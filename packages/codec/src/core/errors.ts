import { BaseError, type ErrorContext } from "@bytewise/errors"

export class InvalidAlphabetError extends BaseError<"invalid_alphabet"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_alphabet", context })
  }
}

/**
 * Raised when decoding meets a character the active alphabet does not know.
 * `context.symbol` and `context.index` point at the first offending character.
 */
export class InvalidSymbolError extends BaseError<"invalid_symbol"> {
  constructor(symbol: string, index: number, encoding: string) {
    super(`Invalid ${encoding} symbol '${symbol}' at index ${index}`, {
      code: "invalid_symbol",
      context: { symbol, index, encoding },
    })
  }
}

export class InvalidRadixError extends BaseError<"invalid_radix"> {
  constructor(radix: number, min: number, max: number) {
    super(`Radix ${radix} is not supported, expected an integer between ${min} and ${max}`, {
      code: "invalid_radix",
      context: { radix, min, max },
    })
  }
}
