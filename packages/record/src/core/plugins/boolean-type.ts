import { FieldKinds } from "../../ports/field-kind"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { malformedPayload, typeMismatch } from "../errors"
import { describeValue } from "../struct/describe-value"
import { leafType } from "./leaf-type"

class BooleanPlugin implements TypePlugin<boolean> {
  readonly kind = FieldKinds.Boolean
  readonly label = "boolean"

  checkType(value: unknown): asserts value is boolean {
    if (typeof value !== "boolean") throw typeMismatch(describeValue(value), this.label)
  }

  checkConstraints(): void {}

  serializeValue(value: boolean): Uint8Array {
    return Uint8Array.of(value ? 0x01 : 0x00)
  }

  deserializeValue(payload: Uint8Array): boolean {
    const [byte] = payload
    if (payload.length !== 1 || (byte !== 0x00 && byte !== 0x01)) {
      throw malformedPayload("is not a valid boolean payload")
    }
    return byte === 0x01
  }
}

export function boolean(): FieldType<boolean> {
  return leafType(new BooleanPlugin())
}
