import type { FieldKind } from "./field-kind"
import type { SchemaResolver } from "./schema-resolver"

/**
 * Runtime capabilities of one field kind.
 *
 * @remarks
 * The struct engine calls `checkConstraints` before `checkType`, so
 * constraints must ignore values that are not of the plugin's own runtime
 * type and leave them for `checkType` to reject.
 *
 * Failures are thrown as `ValidationError` or `CodecError` without a path;
 * enclosing frames prepend field names and "inner element" segments.
 */
export interface TypePlugin<V> {
  readonly kind: FieldKind

  /** Type name used in messages, e.g. "integer" or "list<string>". */
  readonly label: string

  checkType(value: unknown): asserts value is V

  checkConstraints(value: unknown): void

  /**
   * Encode a validated value into a chunk payload.
   * Payloads are never empty: a zero-length chunk means "absent".
   */
  serializeValue(value: V): Uint8Array

  /**
   * @param depth - nesting level of the struct holding this value; 0 for a
   * top-level message. Struct plugins decode one level deeper.
   */
  deserializeValue(payload: Uint8Array, depth?: number): V

  /** Optional copy-on-admit step, e.g. freezing list values. */
  normalize?(value: V): V
}

/**
 * A declared field type, not yet attached to a registry.
 *
 * `bind` is called once when the field is declared; the resulting plugin is
 * stored in the field spec.
 */
export interface FieldType<V> {
  readonly kind: FieldKind
  bind(resolver: SchemaResolver): TypePlugin<V>
}
