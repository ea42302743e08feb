import { Struct } from "./struct"

/** Runtime type name used in type mismatch messages. */
export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof Uint8Array) return "bytes"
  if (Array.isArray(value)) return "list"
  if (value instanceof Struct) return `struct ${value.schema.name}`
  if (typeof value === "number") return Number.isSafeInteger(value) ? "integer" : "number"
  return typeof value
}
