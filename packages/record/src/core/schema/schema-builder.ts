import type { FieldType } from "../../ports/type-plugin"
import { createFieldSpec, type FieldOptions, type FieldSpec } from "./field-spec"
import type { CrossFieldCheck, Schema } from "./schema"
import type { SchemaRegistry } from "./schema-registry"

/** Flattens the accumulated intersection into a plain object type. */
export type Shape<T> = { [K in keyof T]: T[K] }

export type SealedSchemaBuilder<T extends object> = {
  build(): Schema<Shape<T>>
}

/**
 * Fluent schema declaration. Each `field`/`optional` call takes the next
 * sequence number from the registry, so declaration order is wire order.
 *
 * @example
 * ```ts
 * const Person = registry
 *   .define("Person")
 *   .field("age", integer({ signed: false }))
 *   .field("name", string({ maxLength: 50 }))
 *   .field("diabetic", boolean(), { default: true })
 *   .build()
 * ```
 */
export class SchemaBuilder<T extends object> {
  constructor(
    private readonly registry: SchemaRegistry,
    readonly name: string,
    private readonly specs: readonly FieldSpec[] = [],
    private readonly crossCheck?: CrossFieldCheck<Shape<T>>,
  ) {}

  field<K extends string, V>(
    name: K,
    type: FieldType<V>,
    options: FieldOptions<V> = {},
  ): SchemaBuilder<T & Record<K, V>> {
    return new SchemaBuilder<T & Record<K, V>>(this.registry, this.name, [
      ...this.specs,
      this.declare(name, type, options, false),
    ])
  }

  optional<K extends string, V>(
    name: K,
    type: FieldType<V>,
    options: FieldOptions<V> = {},
  ): SchemaBuilder<T & Record<K, V | null>> {
    return new SchemaBuilder<T & Record<K, V | null>>(this.registry, this.name, [
      ...this.specs,
      this.declare(name, type, options, true),
    ])
  }

  /** Declares the cross-field check. Must be the last step before `build()`. */
  check(fn: CrossFieldCheck<Shape<T>>): SealedSchemaBuilder<T> {
    return new SchemaBuilder<T>(this.registry, this.name, this.specs, fn)
  }

  build(): Schema<Shape<T>> {
    return this.registry.register<Shape<T>>(this.name, this.specs, { check: this.crossCheck })
  }

  private declare<V>(
    name: string,
    type: FieldType<V>,
    options: FieldOptions<V>,
    optional: boolean,
  ): FieldSpec<V> {
    return createFieldSpec({
      name,
      sequence: this.registry.nextSequence(),
      optional,
      type,
      options,
      resolver: this.registry,
    })
  }
}
