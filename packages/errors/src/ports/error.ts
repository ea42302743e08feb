export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (limits, offsets, field names) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Location of a failure inside a nested value, outermost segment first.
 *
 * @example ["children", "inner element", "name"]
 */
export type ErrorPath = readonly string[]

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational errors (`true`): invalid input, malformed bytes, constraint failures.
   * - Non-operational errors (`false`): unknown schema names, registering into a frozen registry.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /** Where in a nested value the failure happened. Empty at the top level. */
  readonly path: ErrorPath

  /** The message without its path prefix. */
  readonly reason: string

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging, APIs, and transport.
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
  path?: string[]
  cause?: SerializedError
  stack?: string
}>
