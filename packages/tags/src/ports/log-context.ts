export type LogContext = {
  /** Component emitting the entry, e.g. `"tag-registry"` */
  module: string

  /** Raw tag string being handled */
  tag: string

  /** Tag kind involved (expected or parsed) */
  kind: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
