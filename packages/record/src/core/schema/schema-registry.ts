import { createNullLogger, type Logger } from "@recordwire/logger"

import type { SchemaResolver } from "../../ports/schema-resolver"
import { SchemaError } from "../errors"
import type { FieldSpec } from "./field-spec"
import { Schema, type CrossFieldCheck } from "./schema"
import { SchemaBuilder } from "./schema-builder"

/** 16 MiB */
export const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024 * 1024

export const DEFAULT_MAX_DEPTH = 64

export type SchemaRegistryOptions = Readonly<{
  logger?: Logger
  /** Fail decoding when the chunk count differs from the field count. Default: true */
  strictChunkCount?: boolean
  /** Upper bound on encoded message size accepted by `deserialize`. Default: 16 MiB */
  maxMessageBytes?: number
  /** Deepest nested struct level `deserialize` accepts; the top level is 0. Default: 64 */
  maxDepth?: number
}>

export type RegistrySettings = Readonly<{
  strictChunkCount: boolean
  maxMessageBytes: number
  maxDepth: number
}>

export type RegisterOptions<T extends object> = Readonly<{
  check?: CrossFieldCheck<T>
}>

export class SchemaRegistry implements SchemaResolver {
  readonly settings: RegistrySettings
  readonly logger: Logger

  private readonly schemas = new Map<string, Schema<object>>()
  private sequence = 0
  private frozen = false

  constructor(options: SchemaRegistryOptions = {}) {
    this.settings = Object.freeze({
      strictChunkCount: options.strictChunkCount ?? true,
      maxMessageBytes: options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES,
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    })
    this.logger = (options.logger ?? createNullLogger()).child({ module: "record" })
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  define(name: string): SchemaBuilder<object> {
    return new SchemaBuilder(this, name)
  }

  nextSequence(): number {
    return this.sequence++
  }

  register<T extends object>(
    name: string,
    fields: readonly FieldSpec[],
    options: RegisterOptions<T> = {},
  ): Schema<T> {
    if (this.frozen) {
      throw new SchemaError(`cannot register ${name}: registry is frozen`, {
        code: "registry_frozen",
        context: { schema: name },
      })
    }
    if (this.schemas.has(name)) {
      throw new SchemaError(`schema ${name} is already registered`, {
        code: "duplicate_schema",
        context: { schema: name },
      })
    }

    const seen = new Set<string>()
    for (const spec of fields) {
      if (seen.has(spec.name)) {
        throw new SchemaError(`field ${spec.name} is declared twice in ${name}`, {
          code: "duplicate_field",
          context: { schema: name, field: spec.name },
        })
      }
      seen.add(spec.name)
    }

    const ordered = [...fields].sort((a, b) => a.sequence - b.sequence)
    const schema = new Schema<T>(name, this, ordered, options.check)
    this.schemas.set(name, schema)

    this.logger.debug("schema registered", {
      schema: name,
      operation: "register",
      fields: schema.fieldNames,
    })

    return schema
  }

  resolve(name: string): Schema<object> {
    const schema = this.schemas.get(name)
    if (!schema) {
      throw new SchemaError(`schema ${name} is not registered`, {
        code: "unknown_schema",
        context: { schema: name, known: this.names() },
      })
    }
    return schema
  }

  has(name: string): boolean {
    return this.schemas.has(name)
  }

  names(): string[] {
    return [...this.schemas.keys()]
  }

  freeze(): void {
    if (this.frozen) return
    this.frozen = true
    this.logger.info("schema registry frozen", { operation: "freeze", schemas: this.names() })
  }
}

export function createSchemaRegistry(options: SchemaRegistryOptions = {}): SchemaRegistry {
  return new SchemaRegistry(options)
}

/** Process-wide registry used by {@link defineSchema}. */
export const defaultRegistry = createSchemaRegistry()

export function defineSchema(name: string): SchemaBuilder<object> {
  return defaultRegistry.define(name)
}
