import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Factory function to create a BaseError with less boilerplate.
 *
 * @example
 * ```ts
 * throw createError("config_invalid", "Configuration validation failed", {
 *   context: { keys: ["MAX_MESSAGE_BYTES"] },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  reason: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(reason, { code, ...options })
}
