import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import type { SchemaResolver } from "../../ports/schema-resolver"

/** A default is either a value or a zero-argument factory called at each construction that omits the field. */
export type FieldDefault<V> = V | (() => V)

export type FieldOptions<V> = Readonly<{
  default?: FieldDefault<V>
}>

export type FieldSpec<V = unknown> = Readonly<{
  name: string
  sequence: number
  optional: boolean
  plugin: TypePlugin<V>
  defaultValue?: FieldDefault<V>
}>

export type FieldDeclaration<V> = Readonly<{
  name: string
  sequence: number
  optional: boolean
  type: FieldType<V>
  options: FieldOptions<V>
  resolver: SchemaResolver
}>

export function createFieldSpec<V>(declaration: FieldDeclaration<V>): FieldSpec<V> {
  const { name, sequence, optional, type, options, resolver } = declaration

  return Object.freeze({
    name,
    sequence,
    optional,
    plugin: type.bind(resolver),
    ...(options.default !== undefined && { defaultValue: options.default }),
  })
}

function isFactory<V>(value: FieldDefault<V>): value is () => V {
  return typeof value === "function"
}

export function resolveDefault<V>(value: FieldDefault<V>): V {
  return isFactory(value) ? value() : value
}
