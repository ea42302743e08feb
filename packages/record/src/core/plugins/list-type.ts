import { FieldKinds } from "../../ports/field-kind"
import type { SchemaResolver } from "../../ports/schema-resolver"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { constraintViolation, missingValue, prefixPath, typeMismatch } from "../errors"
import { describeValue } from "../struct/describe-value"
import { decodeChunks, encodeChunks } from "../wire/chunks"
import { PRESENCE_BYTE, withoutPresence } from "./leaf-type"

export type ListOptions = Readonly<{
  maxItems?: number
}>

const ELEMENT = "inner element"

class ListPlugin<V> implements TypePlugin<readonly V[]> {
  readonly kind = FieldKinds.List
  readonly label: string

  constructor(
    private readonly inner: TypePlugin<V>,
    private readonly options: ListOptions,
  ) {
    this.label = `list<${inner.label}>`
  }

  checkType(value: unknown): asserts value is readonly V[] {
    if (!Array.isArray(value)) throw typeMismatch(describeValue(value), this.label)
    for (const element of value) {
      this.eachElement(() => {
        this.inner.checkType(element)
      })
    }
  }

  checkConstraints(value: unknown): void {
    if (!Array.isArray(value)) return

    const { maxItems } = this.options
    if (maxItems !== undefined && value.length > maxItems) {
      throw constraintViolation("too_many_items", `has too many items (maximum ${maxItems})`, {
        items: value.length,
        maxItems,
      })
    }
    for (const element of value) {
      this.eachElement(() => {
        this.inner.checkConstraints(element)
      })
    }
  }

  serializeValue(value: readonly V[]): Uint8Array {
    const chunks = value.map((element) =>
      this.eachElement(() => this.inner.serializeValue(element)),
    )
    return encodeChunks(PRESENCE_BYTE, chunks)
  }

  deserializeValue(payload: Uint8Array, depth = 0): readonly V[] {
    withoutPresence(payload, this.label)

    return decodeChunks(payload, 1).map((chunk) =>
      this.eachElement(() => {
        if (chunk === null) throw missingValue()
        return this.inner.deserializeValue(chunk, depth)
      }),
    )
  }

  normalize(value: readonly V[]): readonly V[] {
    return Object.freeze(
      value.map((element) => (this.inner.normalize ? this.inner.normalize(element) : element)),
    )
  }

  private eachElement<R>(fn: () => R): R {
    try {
      return fn()
    } catch (err) {
      throw prefixPath(err, ELEMENT)
    }
  }
}

/**
 * Homogeneous list of `inner` values.
 *
 * @example
 * ```ts
 * list(integer())                     // readonly number[]
 * list(string({ maxLength: 8 }), { maxItems: 3 })
 * ```
 */
export function list<V>(inner: FieldType<V>, options: ListOptions = {}): FieldType<readonly V[]> {
  return {
    kind: FieldKinds.List,
    bind: (resolver: SchemaResolver) => new ListPlugin(inner.bind(resolver), options),
  }
}
