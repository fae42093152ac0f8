export type LogContext = {
  service: string
  module: string
  operation: string

  encoding: string
  transformer: string
  variant: string
  byteOrder: string
}

export type LogOutcome = {
  length: number
  inPlace: boolean
  copied: boolean
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
