/**
 * Fields a configuration library logs with. `source` is a source name such as
 * "ini:app.ini", `path` the dotted subsection path, and `op` the operation that emitted the
 * entry ("load", "write", "set").
 */
export type LogContext = {
  source: string
  file: string
  path: string
  key: string
  op: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
