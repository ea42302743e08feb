import type { AppError, ErrorCode, ErrorContext, ErrorPath, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  path?: ErrorPath
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date
  readonly reason: string

  private readonly segments: string[]

  constructor(reason: string, options: BaseErrorOptions<C>) {
    const segments = [...(options.path ?? [])]
    super(formatMessage(segments, reason), { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()
    this.reason = reason
    this.segments = segments

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get path(): ErrorPath {
    return [...this.segments]
  }

  /**
   * Prepends `segment` to the error path and rewrites the message.
   * Returns the same instance so enclosing frames can `throw err.at(name)`.
   *
   * @example
   * ```ts
   * try {
   *   checkElement(value)
   * } catch (err) {
   *   if (err instanceof BaseError) throw err.at("inner element")
   *   throw err
   * }
   * ```
   */
  at(segment: string): this {
    this.segments.unshift(segment)
    this.message = formatMessage(this.segments, this.reason)
    return this
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

function formatMessage(segments: readonly string[], reason: string): string {
  return segments.length === 0 ? reason : `${segments.join(" ")} ${reason}`
}

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - BaseError instances (preserves code, context, path)
 * - Standard Error instances (code defaults to "unknown")
 * - Non-Error thrown values (wrapped with context)
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    const path = err.path
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(path.length > 0 && { path: [...path] }),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
