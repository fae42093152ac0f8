import { InvalidAlphabetError } from "./errors"

const ASCII_SIZE = 128

/** Reverse-lookup sentinel for characters that are not part of the alphabet. */
export const NOT_A_SYMBOL = -1

export type AlphabetOptions = {
  /** Identifier used in error messages, e.g. `"base32"`. */
  name?: string

  /**
   * Extra characters accepted when decoding, each mapped onto a symbol of
   * the alphabet. Encoding never emits them.
   *
   * @example `{ "-": "+", "_": "/" }` lets a standard base64 alphabet read
   * url-safe input.
   */
  aliases?: Readonly<Record<string, string>>
}

/**
 * A power-of-two sized, ordered set of ASCII symbols together with the
 * constants needed to pack bytes into it.
 *
 * For base64 `bitsPerChar` is 6, so 4 symbols carry exactly 3 bytes
 * (`charsPerChunk = 4`, `bytesPerChunk = 3`). For base32 it is 8 symbols per
 * 5 bytes, for a 16 symbol alphabet 2 symbols per byte. A chunk is always the
 * smallest symbol run whose bit count is a multiple of 8.
 */
export class Alphabet {
  readonly name: string
  readonly symbols: string
  readonly bitsPerChar: number
  readonly charsPerChunk: number
  readonly bytesPerChunk: number
  readonly mask: number

  private readonly lookup: Int8Array

  constructor(symbols: string, options: AlphabetOptions = {}) {
    this.name = options.name ?? `base${symbols.length}`

    const size = symbols.length
    if (size < 2 || size > ASCII_SIZE || (size & (size - 1)) !== 0) {
      throw new InvalidAlphabetError(
        `Alphabet size must be a power of two between 2 and ${ASCII_SIZE}, got ${size}`,
        { alphabet: this.name, size },
      )
    }

    this.symbols = symbols
    this.bitsPerChar = Math.log2(size)

    const gcd = Math.min(8, this.bitsPerChar & -this.bitsPerChar)
    this.charsPerChunk = 8 / gcd
    this.bytesPerChunk = this.bitsPerChar / gcd
    this.mask = size - 1

    this.lookup = new Int8Array(ASCII_SIZE).fill(NOT_A_SYMBOL)

    for (let i = 0; i < size; i++) {
      const code = asciiCode(symbols[i], this.name)
      if (this.lookup[code] !== NOT_A_SYMBOL) {
        throw new InvalidAlphabetError(`Symbol '${symbols[i]}' appears twice in ${this.name}`, {
          alphabet: this.name,
          symbol: symbols[i],
        })
      }
      this.lookup[code] = i
    }

    for (const [alias, target] of Object.entries(options.aliases ?? {})) {
      const code = asciiCode(alias, this.name)
      const value = this.decode(target)

      if (this.lookup[code] !== NOT_A_SYMBOL || value === NOT_A_SYMBOL) {
        throw new InvalidAlphabetError(
          `Alias '${alias}' → '${target}' must map a new character onto a symbol of ${this.name}`,
          { alphabet: this.name, symbol: alias },
        )
      }
      this.lookup[code] = value
    }
  }

  get size(): number {
    return this.symbols.length
  }

  /** Symbol for the `bits` value (`0 ≤ bits ≤ mask`). */
  encode(bits: number): string {
    return this.symbols.charAt(bits)
  }

  /** Value of `symbol`, or {@link NOT_A_SYMBOL}. Aliases are honored. */
  decode(symbol: string): number {
    return this.decodeCode(symbol.length === 1 ? symbol.charCodeAt(0) : ASCII_SIZE)
  }

  /** Same as {@link decode}, by UTF-16 code unit. */
  decodeCode(code: number): number {
    return code >= 0 && code < ASCII_SIZE ? (this.lookup[code] ?? NOT_A_SYMBOL) : NOT_A_SYMBOL
  }

  has(symbol: string): boolean {
    return this.decode(symbol) !== NOT_A_SYMBOL
  }
}

function asciiCode(symbol: string | undefined, alphabet: string): number {
  if (symbol === undefined || symbol.length !== 1 || symbol.charCodeAt(0) >= ASCII_SIZE) {
    throw new InvalidAlphabetError(`Symbols of ${alphabet} must be single ASCII characters`, {
      alphabet,
      symbol,
    })
  }
  return symbol.charCodeAt(0)
}
