import type { ConnectionManager } from "../connection/connection-manager"
import { ServerAlreadyStartedError, StartupFailedError } from "../errors/protocol-errors"
import type { ResolvedServerOptions, ServerDependencies } from "../server-options"
import type { CreateStopperFn, ServerHandle } from "./create-stopper"
import type { ListenFn } from "./listen"
import type { ShutdownFn } from "./shutdown"
import type { SignalHandler } from "./signals"
import type { StartupFn } from "./startup"

export type ServerState = "idle" | "starting" | "started"

export interface StartServerCollabs {
  onStartup: StartupFn
  onShutdown: ShutdownFn

  listen: ListenFn

  createConnections: () => ConnectionManager
  createStopper: CreateStopperFn
}

export type StartServerContext = {
  deps: ServerDependencies
  options: ResolvedServerOptions

  getState(): ServerState
  setState(state: ServerState): void

  setRunningServer(server: ServerHandle | undefined): void
  getSignalHandler(): SignalHandler | undefined

  collabs: StartServerCollabs
}

/**
 * Run the start hooks, bind the listener and return a handle that stops
 * everything again. A failed start leaves the server idle so it can be
 * started again.
 */
export async function startServer(ctx: StartServerContext): Promise<ServerHandle> {
  if (ctx.getState() !== "idle") throw new ServerAlreadyStartedError()

  ctx.setState("starting")

  const { deps, options, collabs } = ctx

  try {
    const started = await collabs.onStartup({
      clock: deps.clock,
      logger: deps.logger,
      deadlineMs: deps.clock.nowMs() + options.startupTimeoutMs,
      startHooks: options.startHooks,
    })

    if (!started.ok) {
      throw new StartupFailedError(
        started.failures.map((f) => f.hook),
        started.timedOut,
        started.failures[0]?.error,
      )
    }

    const connections = collabs.createConnections()

    const { server, address } = await collabs.listen(
      { host: options.host, port: options.port },
      (socket) => connections.accept(socket),
      deps.logger,
    )

    const running = collabs.createStopper({
      server,
      connections,
      address,
      deps,
      options,
      stopHooks: options.stopHooks,
      shutdown: collabs.onShutdown,
      onStop: () => {
        ctx.getSignalHandler()?.unregister()
        ctx.setRunningServer(undefined)
      },
    })

    ctx.setRunningServer(running)
    ctx.setState("started")

    return running
  } catch (err) {
    ctx.setState("idle")
    throw err
  }
}
