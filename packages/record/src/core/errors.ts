import { BaseError, type BaseErrorOptions, type ErrorContext } from "@recordwire/errors"

export type ValidationErrorCode =
  | "missing_value"
  | "type_mismatch"
  | "constraint_violation"
  | "unknown_field"
  | "validation_failed"

export type ConstraintRule =
  | "too_long"
  | "negative"
  | "below_minimum"
  | "above_maximum"
  | "too_many_items"
  | "unpaired_surrogate"

export type CodecErrorCode =
  | "length_too_large"
  | "truncated_data"
  | "malformed_payload"
  | "unsupported_format"
  | "chunk_count_mismatch"
  | "message_too_large"
  | "nesting_too_deep"

export type SchemaErrorCode =
  | "unknown_schema"
  | "duplicate_schema"
  | "duplicate_field"
  | "registry_frozen"

/** A value was rejected by a field spec or a cross-field check. */
export class ValidationError extends BaseError<ValidationErrorCode> {}

/** Bytes could not be framed or parsed. */
export class CodecError extends BaseError<CodecErrorCode> {}

/** Schemas were declared or looked up incorrectly. Always a programmer error. */
export class SchemaError extends BaseError<SchemaErrorCode> {
  constructor(reason: string, options: BaseErrorOptions<SchemaErrorCode>) {
    super(reason, { ...options, isOperational: false })
  }
}

export function missingValue(): ValidationError {
  return new ValidationError("is missing", { code: "missing_value" })
}

export function typeMismatch(actual: string, expected: string): ValidationError {
  return new ValidationError(`is of type ${actual}, expected ${expected}`, {
    code: "type_mismatch",
    context: { actual, expected },
  })
}

export function constraintViolation(
  rule: ConstraintRule,
  reason: string,
  context: ErrorContext = {},
): ValidationError {
  return new ValidationError(reason, {
    code: "constraint_violation",
    context: { ...context, rule },
  })
}

export function unknownField(name: string, schema: string): ValidationError {
  return new ValidationError(`is not a field of ${schema}`, {
    code: "unknown_field",
    path: [name],
    context: { schema },
  })
}

/**
 * Failure raised by cross-field checks.
 *
 * @example
 * ```ts
 * registry
 *   .define("Range")
 *   .field("min", integer())
 *   .field("max", integer())
 *   .check((range) => {
 *     if (range.get("min") > range.get("max")) {
 *       throw invalid("min must not exceed max", ["min", "max"])
 *     }
 *   })
 *   .build()
 * ```
 */
export function invalid(reason: string, fields: readonly string[] = []): ValidationError {
  return new ValidationError(reason, {
    code: "validation_failed",
    context: { fields: [...fields] },
  })
}

export function malformedPayload(reason: string, cause?: unknown): CodecError {
  return new CodecError(reason, { code: "malformed_payload", cause })
}

export function truncatedData(offset: number, needed: number, available: number): CodecError {
  return new CodecError(
    `needs ${needed} bytes at offset ${offset}, only ${available} available`,
    { code: "truncated_data", context: { offset, needed, available } },
  )
}

/** Prepends `segment` to errors that carry a path; other thrown values pass through. */
export function prefixPath(err: unknown, segment: string): unknown {
  return err instanceof BaseError ? err.at(segment) : err
}
