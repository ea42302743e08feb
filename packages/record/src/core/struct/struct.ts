import type { Schema } from "../schema/schema"
import { unknownField } from "../errors"
import { admitValue } from "./admit-value"

/**
 * Input accepted by constructors: every field may be left out, and
 * `null`/`undefined` both mean "absent" (the default, if any, applies).
 */
export type StructInput<T extends object> = { readonly [K in keyof T]?: T[K] | null }

/**
 * A validated record instance.
 *
 * @remarks
 * Holds one slot per declared field; absent values are `null`. Every
 * successful construction or mutation leaves all required slots filled with
 * values that passed their plugin checks, and the schema's cross-field check
 * satisfied.
 */
export class Struct<T extends object> {
  private constructor(
    readonly schema: Schema<T>,
    private readonly raw: Record<string, unknown>,
    private readonly typed: T,
  ) {}

  /**
   * Validate `input` against `schema` field by field, in declaration order,
   * then run the cross-field check once with every field name.
   */
  static construct<T extends object>(schema: Schema<T>, input: object): Struct<T> {
    const provided = new Map<string, unknown>(Object.entries(input))

    for (const key of provided.keys()) {
      if (!schema.has(key)) throw unknownField(key, schema.name)
    }

    const raw: Record<string, unknown> = {}
    for (const spec of schema.fields) {
      raw[spec.name] = admitValue(spec, provided.get(spec.name))
    }

    if (!conforms(schema, raw)) {
      throw new TypeError(`struct ${schema.name} is missing declared slots`)
    }

    const struct = new Struct(schema, raw, raw)
    schema.runCheck(struct, new Set(schema.fieldNames))
    return struct
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.typed[key]
  }

  set<K extends keyof T & string>(key: K, value: T[K] | null | undefined): void {
    this.assign(key, value)
  }

  /** Untyped read by field name. Unknown names read as `undefined`. */
  read(name: string): unknown {
    return this.raw[name]
  }

  /**
   * Untyped mutation by field name: validates the value, stores it, then
   * re-runs the cross-field check with `{ name }`. A failing check restores
   * the previous value before the error propagates.
   */
  assign(name: string, value: unknown): void {
    const spec = this.schema.field(name)
    if (!spec) throw unknownField(name, this.schema.name)

    const admitted = admitValue(spec, value)
    const previous = this.raw[name]
    this.raw[name] = admitted

    try {
      this.schema.runCheck(this, new Set([name]))
    } catch (err) {
      this.raw[name] = previous
      throw err
    }
  }

  /** Shallow copy of the field values. */
  toObject(): T {
    return { ...this.typed }
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Struct) || other.schema !== this.schema) return false
    return this.schema.fields.every((spec) =>
      valuesEqual(this.raw[spec.name], other.read(spec.name)),
    )
  }
}

function conforms<T extends object>(
  schema: Schema<T>,
  raw: Record<string, unknown>,
): raw is Record<string, unknown> & T {
  return schema.fields.every((spec) => Object.hasOwn(raw, spec.name))
}

/** Deep value equality: bytes bytewise, lists elementwise, structs recursively. */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, index) => byte === b[index])
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]))
  }

  if (a instanceof Struct) return a.equals(b)

  return false
}
