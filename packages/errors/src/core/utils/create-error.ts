import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Factory for one-off errors that do not warrant their own subclass.
 *
 * @example
 * ```ts
 * throw createError("config_invalid", "BYTE_ORDER must be big-endian or little-endian", {
 *   context: { value: "middle-endian" },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
