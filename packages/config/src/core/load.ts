import { createError } from "@recordwire/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Defaults to the unprefixed process environment. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue
      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw createError(
      "config_invalid",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        context: {
          keys: result.error.issues.map((issue) => issue.path.map(String).join(".")),
        },
        cause: result.error,
      },
    )
  }

  const resolved: Record<string, string> = {}
  for (const key of Object.keys(result.data)) {
    resolved[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, resolved, new Set(Object.keys(merged)))
}
