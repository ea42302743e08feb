import { FieldKinds } from "../../ports/field-kind"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { constraintViolation, malformedPayload, typeMismatch } from "../errors"
import { describeValue } from "../struct/describe-value"
import { leafType, withoutPresence, withPresence } from "./leaf-type"

export type StringOptions = Readonly<{
  /** Maximum length in code points. */
  maxLength?: number
}>

const encoder = new TextEncoder()

// With the u flag, paired surrogates form one code point, so only lone halves match.
const UNPAIRED_SURROGATE = /\p{Surrogate}/u
const decoder = new TextDecoder("utf-8", { fatal: true })

class StringPlugin implements TypePlugin<string> {
  readonly kind = FieldKinds.String
  readonly label = "string"

  constructor(private readonly options: StringOptions) {}

  checkType(value: unknown): asserts value is string {
    if (typeof value !== "string") throw typeMismatch(describeValue(value), this.label)
  }

  checkConstraints(value: unknown): void {
    if (typeof value !== "string") return

    const unpaired = UNPAIRED_SURROGATE.exec(value)
    if (unpaired) {
      throw constraintViolation("unpaired_surrogate", "is not well-formed UTF-16", {
        index: unpaired.index,
      })
    }

    const { maxLength } = this.options
    if (maxLength === undefined) return

    const length = codePointLength(value)
    if (length > maxLength) {
      throw constraintViolation("too_long", `is too long (maximum ${maxLength})`, {
        length,
        maxLength,
      })
    }
  }

  serializeValue(value: string): Uint8Array {
    return withPresence(encoder.encode(value))
  }

  deserializeValue(payload: Uint8Array): string {
    const body = withoutPresence(payload, this.label)
    try {
      return decoder.decode(body)
    } catch (err) {
      throw malformedPayload("is not valid UTF-8", err)
    }
  }
}

export function string(options: StringOptions = {}): FieldType<string> {
  return leafType(new StringPlugin(options))
}

function codePointLength(value: string): number {
  return Array.from(value).length
}
