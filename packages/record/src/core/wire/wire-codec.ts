import type { FieldSpec } from "../schema/field-spec"
import type { Schema } from "../schema/schema"
import { Struct } from "../struct/struct"
import { CodecError, prefixPath, truncatedData } from "../errors"
import { decodeChunks, encodeChunks, type Chunk } from "./chunks"

/** Leading byte of every wire value. */
export const FORMAT_MARKER = 0x01

/**
 * Encode a struct: the format marker, then one chunk per field in
 * declaration order (0x00 for absent values). Deterministic.
 */
export function serialize<T extends object>(struct: Struct<T>): Uint8Array {
  const chunks = struct.schema.fields.map((spec) => encodeField(spec, struct.read(spec.name)))
  return encodeChunks(FORMAT_MARKER, chunks)
}

/**
 * Decode bytes produced by {@link serialize} for `schema`. Field values go
 * through the same validation as {@link Struct.construct}.
 */
export function deserialize<T extends object>(schema: Schema<T>, bytes: Uint8Array): Struct<T> {
  return decodeStruct(schema, bytes, 0)
}

/**
 * {@link deserialize} at a given nesting level. Nested struct fields call
 * this with their parent's depth plus one.
 */
export function decodeStruct<T extends object>(
  schema: Schema<T>,
  bytes: Uint8Array,
  depth: number,
): Struct<T> {
  const { settings, logger } = schema.registry

  if (depth > settings.maxDepth) {
    throw new CodecError(`nesting exceeds ${settings.maxDepth} levels`, {
      code: "nesting_too_deep",
      context: { schema: schema.name, depth, limit: settings.maxDepth },
    })
  }

  if (bytes.length > settings.maxMessageBytes) {
    throw new CodecError(
      `message of ${bytes.length} bytes exceeds the ${settings.maxMessageBytes} byte limit`,
      { code: "message_too_large", context: { size: bytes.length, limit: settings.maxMessageBytes } },
    )
  }

  const marker = bytes[0]
  if (marker === undefined) throw truncatedData(0, 1, 0)
  if (marker !== FORMAT_MARKER) {
    throw new CodecError(`unsupported format marker 0x${marker.toString(16).padStart(2, "0")}`, {
      code: "unsupported_format",
      context: { marker },
    })
  }

  const chunks = decodeChunks(bytes, 1)
  const expected = schema.fields.length

  if (chunks.length !== expected) {
    if (settings.strictChunkCount) {
      throw new CodecError(`expected ${expected} chunks for ${schema.name}, got ${chunks.length}`, {
        code: "chunk_count_mismatch",
        context: { schema: schema.name, expected, received: chunks.length },
      })
    }
    logger.warn("chunk count does not match schema", {
      schema: schema.name,
      operation: "decode",
      expected,
      received: chunks.length,
    })
  }

  const values: Record<string, unknown> = {}
  schema.fields.forEach((spec, index) => {
    values[spec.name] = decodeField(spec, chunks[index], depth)
  })

  return Struct.construct(schema, values)
}

function encodeField(spec: FieldSpec, value: unknown): Chunk {
  if (value === null || value === undefined) return null
  try {
    return spec.plugin.serializeValue(value)
  } catch (err) {
    throw prefixPath(err, spec.name)
  }
}

function decodeField(spec: FieldSpec, chunk: Chunk | undefined, depth: number): unknown {
  if (!chunk) return null
  try {
    return spec.plugin.deserializeValue(chunk, depth)
  } catch (err) {
    throw prefixPath(err, spec.name)
  }
}
