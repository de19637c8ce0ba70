import type { Logger } from "@respire/logger"
import type { PhaseResult } from "./lifecycle-hook"

/** The slice of `process` the handlers attach to. */
export interface ProcessEvents {
  on(event: "SIGINT" | "SIGTERM", listener: () => void): unknown
  on(event: "uncaughtException", listener: (err: Error) => void): unknown
  on(event: "unhandledRejection", listener: (reason: unknown) => void): unknown
  off(event: "SIGINT" | "SIGTERM", listener: () => void): unknown
  off(event: "uncaughtException", listener: (err: Error) => void): unknown
  off(event: "unhandledRejection", listener: (reason: unknown) => void): unknown
  exit(code: number): void
}

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<PhaseResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process */
  proc?: ProcessEvents
}

export interface SignalHandler {
  unregister: () => void
}

const DEFAULT_FATAL_TIMEOUT_MS = 10_000

/**
 * SIGINT and SIGTERM stop the server gracefully. An uncaught exception or
 * unhandled rejection stops it and exits with code 1, forcing the exit if
 * stopping takes longer than `fatalTimeoutMs`. A second fatal error while
 * stopping exits at once.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const proc = ctx.proc ?? process
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? DEFAULT_FATAL_TIMEOUT_MS
  const { logger } = ctx

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      logger.fatal("Fatal error during shutdown", { reason, err })
      proc.exit(1)
      return
    }

    stopping = true
    logger.fatal("Fatal error", { reason, err })

    void withForceExit(ctx, proc, fatalTimeoutMs, () => runStop(ctx, reason)).then(() => proc.exit(1))
  }

  const onSigint = () => onSignal("SIGINT")
  const onSigterm = () => onSignal("SIGTERM")
  const onUncaught = (err: Error) => onFatal("uncaughtException", err)
  const onRejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  proc.on("SIGINT", onSigint)
  proc.on("SIGTERM", onSigterm)
  proc.on("uncaughtException", onUncaught)
  proc.on("unhandledRejection", onRejection)

  return {
    unregister: () => {
      proc.off("SIGINT", onSigint)
      proc.off("SIGTERM", onSigterm)
      proc.off("uncaughtException", onUncaught)
      proc.off("unhandledRejection", onRejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

async function withForceExit(
  ctx: SignalHandlerContext,
  proc: ProcessEvents,
  ms: number,
  fn: () => Promise<void>,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs: ms })
    proc.exit(1)
  }, ms)

  timer.unref()

  try {
    await fn()
  } finally {
    clearTimeout(timer)
  }
}
