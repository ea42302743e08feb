import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard to check if a value is an AppError, including errors that crossed
 * a package boundary with a different copy of BaseError.
 *
 * @example
 * ```ts
 * try {
 *   deserialize(schema, bytes)
 * } catch (err) {
 *   if (isAppError(err)) {
 *     logger.warn("rejected message", { code: err.code, path: err.path })
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    Array.isArray(e.path) &&
    typeof e.reason === "string" &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
