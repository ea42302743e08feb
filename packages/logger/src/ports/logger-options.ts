import type { LogLevelName } from "./log-level"

/** Adapter-neutral settings, usually read from `LOG_LEVEL` and `LOG_PRETTY`. */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output for local runs; structured JSON otherwise. */
  prettify?: boolean
}
