import type { Schema } from "../core/schema/schema"

/**
 * Looks schemas up by name. Struct fields declared by name hold a resolver
 * and call it on first use, which is what lets a schema refer to itself or
 * to a schema registered later.
 */
export interface SchemaResolver {
  resolve(name: string): Schema<object>
}
