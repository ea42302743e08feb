import { serializeError } from "@recordwire/errors"
import type { Logger } from "@recordwire/logger"

import type { Codec } from "../../ports/codec"
import type { Schema } from "../schema/schema"
import type { Struct } from "../struct/struct"
import { deserialize, serialize } from "../wire/wire-codec"

export type StructCodecDeps<T extends object> = {
  schema: Schema<T>
  /** Defaults to the schema registry's logger. */
  logger?: Logger
}

/**
 * Adapts a schema to the {@link Codec} port consumed by transports and stores.
 * Decode failures are logged at warn, with the error's code and path, and rethrown unchanged.
 */
export class StructCodec<T extends object> implements Codec<Struct<T>> {
  private readonly schema: Schema<T>
  private readonly logger: Logger

  constructor(deps: StructCodecDeps<T>) {
    this.schema = deps.schema
    this.logger = (deps.logger ?? deps.schema.registry.logger).child({ schema: deps.schema.name })
  }

  encode(value: Struct<T>): Uint8Array {
    return serialize(value)
  }

  decode(bytes: Uint8Array): Struct<T> {
    try {
      return deserialize(this.schema, bytes)
    } catch (err) {
      const error = serializeError(err)
      this.logger.warn("failed to decode struct", {
        operation: "decode",
        code: error.code,
        size: bytes.length,
        error,
      })
      throw err
    }
  }
}

export function createStructCodec<T extends object>(
  schema: Schema<T>,
  deps: { logger?: Logger } = {},
): Codec<Struct<T>> {
  return new StructCodec({ schema, ...deps })
}
