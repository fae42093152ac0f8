import type { Variant } from "../ports/variant"

function assertNever(variant: never): never {
  throw new TypeError(`Unknown byte sequence variant: ${String(variant)}`)
}

/** Whether `transform` may hand the live buffer to a transformer. */
export function allowsInPlace(variant: Variant): boolean {
  switch (variant) {
    case "shared":
    case "mutable":
      return true
    case "immutable":
    case "read-only":
      return false
    default:
      return assertNever(variant)
  }
}

/** Whether direct writes (`setByteAt`, `fill`, `wipe`, ...) are allowed. */
export function allowsWrites(variant: Variant): boolean {
  switch (variant) {
    case "mutable":
      return true
    case "shared":
    case "immutable":
    case "read-only":
      return false
    default:
      return assertNever(variant)
  }
}

export type BufferAccess = "live" | "copy" | "denied"

/** What `array()` hands out. */
export function bufferAccess(variant: Variant): BufferAccess {
  switch (variant) {
    case "shared":
    case "mutable":
      return "live"
    case "immutable":
      return "copy"
    case "read-only":
      return "denied"
    default:
      return assertNever(variant)
  }
}

/**
 * Whether converting a `from` sequence into a `to` sequence must copy the
 * buffer.
 *
 * Frozen sources never give their buffer away, and a frozen target never
 * aliases a buffer that stays writable through its source.
 */
export function transitionCopies(from: Variant, to: Variant): boolean {
  if (!allowsInPlace(from)) return true
  return from === "mutable" && !allowsInPlace(to)
}
