import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Write JSON lines here instead of stdout. Takes precedence over `prettify`. */
  destination?: DestinationStream

  /** Existing pino instance to derive from (used by child()). */
  base?: PinoLoggerBase
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    deps: PinoLoggerDeps = {},
  ) {
    this.opts = opts
    this.logger = this.init(bindings, deps)
  }

  private init(bindings: LogContextPatch, deps: PinoLoggerDeps): PinoLoggerBase {
    if (deps.base) return deps.base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)

    return root.child(bindings)
  }

  trace(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.fatal(meta, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, { base: this.logger })
  }
}
