export type LogContext = {
  service: string
  module: string

  /** Name of the schema being registered, encoded or decoded. */
  schema: string
  field: string
  operation: "register" | "freeze" | "encode" | "decode" | "construct"
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
