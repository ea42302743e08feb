import { FieldKinds } from "../../ports/field-kind"
import type { SchemaResolver } from "../../ports/schema-resolver"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { typeMismatch } from "../errors"
import type { Schema } from "../schema/schema"
import { describeValue } from "../struct/describe-value"
import { Struct } from "../struct/struct"
import { decodeStruct, serialize } from "../wire/wire-codec"

class StructPlugin<U extends object> implements TypePlugin<Struct<U>> {
  readonly kind = FieldKinds.Struct
  private resolved: Schema<object> | undefined

  constructor(
    private readonly target: Schema<U> | string,
    private readonly resolver: SchemaResolver,
  ) {}

  get label(): string {
    return `struct ${typeof this.target === "string" ? this.target : this.target.name}`
  }

  checkType(value: unknown): asserts value is Struct<U> {
    const schema = this.schema()
    if (!(value instanceof Struct) || value.schema !== schema) {
      throw typeMismatch(describeValue(value), this.label)
    }
  }

  checkConstraints(): void {}

  serializeValue(value: Struct<U>): Uint8Array {
    return serialize(value)
  }

  deserializeValue(payload: Uint8Array, depth = 0): Struct<U> {
    const struct = decodeStruct(this.schema(), payload, depth + 1)
    this.checkType(struct)
    return struct
  }

  private schema(): Schema<object> {
    if (typeof this.target !== "string") return this.target
    this.resolved ??= this.resolver.resolve(this.target)
    return this.resolved
  }
}

/**
 * Nested struct field. Pass a schema, or its name for self and forward
 * references; names resolve through the registry on first use.
 *
 * @example
 * ```ts
 * type Tree = { left: Struct<Tree> | null; right: Struct<Tree> | null; value: string }
 *
 * const Tree: Schema<Tree> = registry
 *   .define("Tree")
 *   .optional("left", struct<Tree>("Tree"))
 *   .optional("right", struct<Tree>("Tree"))
 *   .field("value", string())
 *   .build()
 * ```
 */
export function struct<U extends object>(target: Schema<U> | string): FieldType<Struct<U>> {
  return {
    kind: FieldKinds.Struct,
    bind: (resolver: SchemaResolver) => new StructPlugin<U>(target, resolver),
  }
}
