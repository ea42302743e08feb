import { type ConfigSource, EnvSource, loadConfig } from "@recordwire/config"
import { type Logger, PinoLogger, type PinoLoggerDeps } from "@recordwire/logger"

import { createSchemaRegistry, type SchemaRegistry } from "../schema/schema-registry"
import { codecSettingsSchema, SETTINGS_ENV_PREFIX } from "./codec-settings"

export type LoadSchemaRegistryOptions = {
  /** Defaults to environment variables prefixed with `RECORDWIRE_`. */
  sources?: ConfigSource[]
  /** Skips building a pino logger from the loaded settings. */
  logger?: Logger
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Load codec settings and build a registry configured with them.
 *
 * @example
 * ```ts
 * const registry = await loadSchemaRegistry()
 * const Person = registry.define("Person").field("name", string()).build()
 * registry.freeze()
 * ```
 */
export async function loadSchemaRegistry(
  options: LoadSchemaRegistryOptions = {},
): Promise<SchemaRegistry> {
  const config = await loadConfig({
    schema: codecSettingsSchema,
    sources: options.sources ?? [new EnvSource({ prefix: SETTINGS_ENV_PREFIX })],
  })

  const logger =
    options.logger ??
    new PinoLogger(
      { destination: options.destination },
      { level: config.get("LOG_LEVEL"), prettify: config.get("LOG_PRETTY") },
      { service: "recordwire" },
    )

  return createSchemaRegistry({
    logger,
    strictChunkCount: config.get("STRICT_CHUNK_COUNT"),
    maxMessageBytes: config.get("MAX_MESSAGE_BYTES"),
    maxDepth: config.get("MAX_DEPTH"),
  })
}
