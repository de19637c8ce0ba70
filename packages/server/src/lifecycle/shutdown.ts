import type { Clock, UnixMs } from "@respire/clock"
import type { Logger } from "@respire/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

/** Anything holding client connections open. */
export interface ConnectionCloser {
  closeAll(signal?: AbortSignal): Promise<void>
}

export type ShutdownContext = {
  server: Closeable
  connections: ConnectionCloser
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: readonly LifecycleHook[]
}

/**
 * Close client connections, then the listener, then run the stop hooks.
 * Every step runs even when an earlier one failed.
 */
export async function shutdown(ctx: ShutdownContext): Promise<PhaseResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const hooks: LifecycleHook[] = [
    closeConnectionsHook(ctx.connections),
    closeServerHook(ctx.server),
    ...ctx.stopHooks,
  ]

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    hooks,
    { failFast: false },
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete", { ok, failures: failures.length, timedOut })

  return { ok, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeConnectionsHook(connections: ConnectionCloser): LifecycleHook {
  return {
    name: "connections.close",
    fn: ({ signal }) => connections.closeAll(signal),
  }
}

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const outcome = await untilAborted(closeServer(server), signal)

      if (outcome.kind === "done" && outcome.value.error) throw outcome.value.error
    },
  }
}

function closeServer(server: Closeable): Promise<{ error?: Error }> {
  return new Promise((resolve) => {
    server.close((err) => resolve(err ? { error: err } : {}))
  })
}

type Raced<T> = { kind: "done"; value: T } | { kind: "aborted" }

async function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  if (signal.aborted) return { kind: "aborted" }

  let onAbort: (() => void) | undefined

  const aborted = new Promise<Raced<T>>((resolve) => {
    onAbort = () => resolve({ kind: "aborted" })
    signal.addEventListener("abort", onAbort, { once: true })
  })

  try {
    return await Promise.race([work.then((value): Raced<T> => ({ kind: "done", value })), aborted])
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}
