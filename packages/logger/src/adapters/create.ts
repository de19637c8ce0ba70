import type { Logger } from "../ports/logger"
import type { LogContextPatch } from "../ports/log-context"
import type { LoggerOptions } from "../ports/logger-options"
import { NullLogger } from "./null/null-logger"
import { PinoLogger, type PinoLoggerDeps } from "./pino/pino-logger"

export type CreateLoggerOptions = LoggerOptions & {
  /** Discard everything. Used by tests and embedded servers. */
  silent?: boolean
  bindings?: LogContextPatch
}

export function createLogger(opts: CreateLoggerOptions, deps: PinoLoggerDeps = {}): Logger {
  if (opts.silent) return new NullLogger()

  return new PinoLogger(
    { level: opts.level, prettify: opts.prettify ?? false },
    opts.bindings ?? {},
    deps,
  )
}
