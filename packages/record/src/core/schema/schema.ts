import type { FieldSpec } from "./field-spec"
import type { SchemaRegistry } from "./schema-registry"
import { Struct, type StructInput } from "../struct/struct"

/**
 * Cross-field check run after construction (with every field name) and after
 * each mutation (with the mutated field name only). Throw to reject.
 */
export type CrossFieldCheck<T extends object> = (
  struct: Struct<T>,
  changed: ReadonlySet<string>,
) => void

type CheckHolder<T extends object> = {
  run(struct: Struct<T>, changed: ReadonlySet<string>): void
}

/**
 * A registered record type: a name plus field specs in declaration order.
 * Instances are created by {@link SchemaRegistry.register}, never directly.
 */
export class Schema<T extends object> {
  readonly fields: readonly FieldSpec[]
  private readonly byName: ReadonlyMap<string, FieldSpec>
  private readonly checker: CheckHolder<T> | undefined

  constructor(
    readonly name: string,
    readonly registry: SchemaRegistry,
    fields: readonly FieldSpec[],
    check?: CrossFieldCheck<T>,
  ) {
    this.fields = Object.freeze([...fields])
    this.byName = new Map(fields.map((spec) => [spec.name, spec]))
    this.checker = check ? { run: check } : undefined
  }

  get fieldNames(): string[] {
    return this.fields.map((spec) => spec.name)
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }

  field(name: string): FieldSpec | undefined {
    return this.byName.get(name)
  }

  create(input: StructInput<T>): Struct<T> {
    return Struct.construct(this, input)
  }

  runCheck(struct: Struct<T>, changed: ReadonlySet<string>): void {
    this.checker?.run(struct, changed)
  }
}
