export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Carries the offending values (symbols, indices, lengths) so callers do not
 * have to parse them back out of the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected failure caused by the caller's input
   * (true) or a broken internal invariant (false).
   *
   * @remarks
   * - Operational errors (`true`): undecodable text, an index out of range,
   *   a write on a frozen sequence.
   * - Non-operational errors (`false`): a transformer that ignored the
   *   in-place flag it was given.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
