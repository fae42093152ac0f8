import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural guard for AppError, so errors raised by another copy of this
 * package (or by hand-rolled equivalents) are still recognized.
 *
 * @example
 * ```ts
 * try {
 *   Bytes.parseHex(input)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "invalid_symbol") {
 *     report(err.context.index)
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
