import type { ResolvedServerOptions, ServerDependencies } from "../server-options"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import type { BoundAddress } from "./listen"
import type { Closeable, ConnectionCloser, ShutdownFn } from "./shutdown"

export interface ServerHandle {
  /** Stop the server. Repeated calls share the first call's result. */
  stop(): Promise<PhaseResult>
  /** Where the listener is bound; the real port when 0 was requested. */
  address: BoundAddress
  connectionCount(): number
}

export interface RunningServerContext {
  server: Closeable
  connections: ConnectionCloser & { count(): number }
  address: BoundAddress

  deps: ServerDependencies
  options: ResolvedServerOptions

  onStop: () => void
  shutdown: ShutdownFn
  stopHooks: readonly LifecycleHook[]
}

export function createStopper(ctx: RunningServerContext): ServerHandle {
  let stopping: Promise<PhaseResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)

      return stopping
    },
    address: ctx.address,
    connectionCount: () => ctx.connections.count(),
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: RunningServerContext): Promise<PhaseResult> {
  try {
    return await ctx.shutdown({
      server: ctx.server,
      connections: ctx.connections,
      clock: ctx.deps.clock,
      logger: ctx.deps.logger,
      deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
