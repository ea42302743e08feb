import type { Schema } from "../schema/schema"
import { Struct } from "./struct"

export function construct<T extends object>(
  schema: Schema<T>,
  values: Readonly<Record<string, unknown>>,
): Struct<T> {
  return Struct.construct(schema, values)
}

export function mutate<T extends object>(struct: Struct<T>, field: string, value: unknown): void {
  struct.assign(field, value)
}

export function equals<A extends object, B extends object>(a: Struct<A>, b: Struct<B>): boolean {
  return a.equals(b)
}
