import { FieldKinds } from "../../ports/field-kind"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { constraintViolation, typeMismatch } from "../errors"
import { describeValue } from "../struct/describe-value"
import { leafType, withoutPresence, withPresence } from "./leaf-type"

export type BytesOptions = Readonly<{
  /** Maximum length in bytes. */
  maxLength?: number
}>

class BytesPlugin implements TypePlugin<Uint8Array> {
  readonly kind = FieldKinds.Bytes
  readonly label = "bytes"

  constructor(private readonly options: BytesOptions) {}

  checkType(value: unknown): asserts value is Uint8Array {
    if (!(value instanceof Uint8Array)) throw typeMismatch(describeValue(value), this.label)
  }

  checkConstraints(value: unknown): void {
    const { maxLength } = this.options
    if (!(value instanceof Uint8Array) || maxLength === undefined) return
    if (value.length > maxLength) {
      throw constraintViolation("too_long", `is too long (maximum ${maxLength})`, {
        length: value.length,
        maxLength,
      })
    }
  }

  serializeValue(value: Uint8Array): Uint8Array {
    return withPresence(value)
  }

  deserializeValue(payload: Uint8Array): Uint8Array {
    return withoutPresence(payload, this.label).slice()
  }
}

export function bytes(options: BytesOptions = {}): FieldType<Uint8Array> {
  return leafType(new BytesPlugin(options))
}
