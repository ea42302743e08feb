export { BaseError, serializeError } from "./core/base-error"
export type { BaseErrorOptions, SerializeOptions } from "./core/base-error"
export { createError } from "./core/utils/create-error"
export { isAppError } from "./core/utils/is-app-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  ErrorPath,
  SerializedError,
} from "./ports/error"
