import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/**
 * Discards every entry. Schema registries fall back to it, so encoding and
 * decoding stay silent until an application passes a real logger.
 */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

const silent = new NullLogger()

export function createNullLogger(): Logger {
  return silent
}
