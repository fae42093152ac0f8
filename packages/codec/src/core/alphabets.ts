import { Alphabet } from "./alphabet"

const BASE32_RFC4648_SYMBOLS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567"
const BASE32_CROCKFORD_SYMBOLS = "0123456789ABCDEFGHJKMNPQRSTVWXYZ"
const BASE64_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789"

/** RFC 4648 §6, the standard (not "extended hex") base32 alphabet. */
export const BASE32_RFC4648 = new Alphabet(BASE32_RFC4648_SYMBOLS, { name: "base32" })

/**
 * Crockford's base32: no I, L, O or U. Decoding is case-insensitive and reads
 * the look-alikes I/L as 1 and O as 0.
 *
 * @see https://www.crockford.com/base32.html
 */
export const BASE32_CROCKFORD = new Alphabet(BASE32_CROCKFORD_SYMBOLS, {
  name: "base32-crockford",
  aliases: crockfordAliases(),
})

/** RFC 4648 §4. Also reads the url-safe `-` and `_`. */
export const BASE64_STANDARD = new Alphabet(`${BASE64_LETTERS}+/`, {
  name: "base64",
  aliases: { "-": "+", _: "/" },
})

/** RFC 4648 §5. Also reads the standard `+` and `/`. */
export const BASE64_URL_SAFE = new Alphabet(`${BASE64_LETTERS}-_`, {
  name: "base64url",
  aliases: { "+": "-", "/": "_" },
})

function crockfordAliases(): Record<string, string> {
  const aliases: Record<string, string> = { I: "1", i: "1", L: "1", l: "1", O: "0", o: "0" }

  for (const symbol of BASE32_CROCKFORD_SYMBOLS) {
    const lower = symbol.toLowerCase()
    if (lower !== symbol) aliases[lower] = symbol
  }

  return aliases
}
