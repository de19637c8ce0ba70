import type { Logger } from "@respire/logger"
import { ConnectionManager } from "./connection/connection-manager"
import { Dispatcher } from "./dispatch/dispatcher"
import { createStopper, type ServerHandle } from "./lifecycle/create-stopper"
import type { PhaseResult } from "./lifecycle/lifecycle-hook"
import { listen } from "./lifecycle/listen"
import { shutdown } from "./lifecycle/shutdown"
import { type SignalHandler, setupProcessHandlers } from "./lifecycle/signals"
import { type ServerState, startServer } from "./lifecycle/start-server"
import { startup } from "./lifecycle/startup"
import { resolveOptions, type ServerDependencies, type ServerOptions } from "./server-options"

export interface Server {
  /** Stop gracefully on SIGINT/SIGTERM, fatally on uncaught errors. */
  setupProcessHandlers(): this
  start(): Promise<ServerHandle>
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  const resolvedOptions = resolveOptions(options)

  const { logger } = deps

  const dispatcher = new Dispatcher(
    { store: deps.store, logger },
    { replies: resolvedOptions.replies },
  )

  let state: ServerState = "idle"
  let runningServer: ServerHandle | undefined
  let signalHandler: SignalHandler | undefined

  const server: Server = {
    setupProcessHandlers() {
      if (signalHandler) return server

      signalHandler = setupProcessHandlers({
        logger,
        stop: () => runningServer?.stop() ?? noopStop(logger),
      })

      return server
    },

    start() {
      return startServer({
        collabs: {
          onStartup: startup,
          onShutdown: shutdown,

          listen,

          createConnections: () =>
            new ConnectionManager(
              { dispatcher, logger },
              { maxFrameBytes: resolvedOptions.maxFrameBytes },
            ),
          createStopper,
        },

        deps,
        options: resolvedOptions,

        getState: () => state,
        setState: (s) => {
          state = s
        },

        setRunningServer: (s) => {
          runningServer = s
        },

        getSignalHandler: () => signalHandler,
      })
    },
  }

  return server
}

function noopStop(logger: Logger): Promise<PhaseResult> {
  logger.warn("Stop called but server not running")

  return Promise.resolve({ ok: true, failures: [], timedOut: false })
}
