import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger.contract"
import { type LogLevelName, logLevelNames } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

function toLevelName(level: unknown): LogLevelName {
  const name = logLevelNames.find((n, i) => (i + 1) * 10 === level)
  return name ?? "info"
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk, _, cb) {
          const payload: Record<string, unknown> = JSON.parse(chunk.toString())

          captured.push({ level: toLevelName(payload.level), payload })

          cb()
        },
      })

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
