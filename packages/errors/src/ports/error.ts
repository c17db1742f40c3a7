export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: keys, paths, file names and the like.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying the same operation might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (a missing key, a malformed file) or a
   * programmer error (passing something that is not a configuration view).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used for log payloads.
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
