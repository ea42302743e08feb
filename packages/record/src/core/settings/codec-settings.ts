import { logLevelNames } from "@recordwire/logger"
import { z } from "zod"

import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_MESSAGE_BYTES } from "../schema/schema-registry"

/** Environment variables are read with this prefix stripped, e.g. `RECORDWIRE_LOG_LEVEL`. */
export const SETTINGS_ENV_PREFIX = "RECORDWIRE_"

const flag = z.union([z.boolean(), z.stringbool()])

export const codecSettingsSchema = z.object({
  STRICT_CHUNK_COUNT: flag.default(true),
  MAX_MESSAGE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_MESSAGE_BYTES),
  MAX_DEPTH: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_DEPTH),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type CodecSettings = z.infer<typeof codecSettingsSchema>
