import type { Logger } from "@respire/logger"
import type { CommandDispatcher } from "../dispatch/dispatcher"
import { Connection } from "./connection"
import { type ConnectionSocket, describeRemote } from "./connection-socket"

export type ConnectionManagerDeps = {
  dispatcher: CommandDispatcher
  logger: Logger
}

export type ConnectionManagerOptions = {
  maxFrameBytes: number
}

/**
 * Owns every open connection. Once `closeAll` starts, new sockets are
 * dropped on arrival.
 */
export class ConnectionManager {
  private nextId = 1
  private accepting = true
  private readonly connections = new Map<string, Connection>()

  constructor(
    private readonly deps: ConnectionManagerDeps,
    private readonly opts: ConnectionManagerOptions,
  ) {}

  accept(socket: ConnectionSocket): Connection | undefined {
    if (!this.accepting) {
      socket.destroy()
      return undefined
    }

    const id = `conn-${this.nextId++}`
    const remoteAddress = describeRemote(socket)
    const logger = this.deps.logger.child({ connectionId: id, remoteAddress })

    const connection = new Connection(
      { socket, dispatcher: this.deps.dispatcher, logger },
      {
        id,
        maxFrameBytes: this.opts.maxFrameBytes,
        onClose: (closed) => this.connections.delete(closed.id),
      },
    )

    this.connections.set(id, connection)
    logger.debug("Connection accepted")

    return connection
  }

  count(): number {
    return this.connections.size
  }

  get(id: string): Connection | undefined {
    return this.connections.get(id)
  }

  /**
   * Close every connection gracefully. Aborting `signal` destroys whatever
   * is still open.
   */
  async closeAll(signal?: AbortSignal): Promise<void> {
    this.accepting = false

    const open = [...this.connections.values()]
    if (open.length === 0) return

    const destroyAll = () => {
      for (const connection of open) void connection.destroy()
    }

    if (signal?.aborted) destroyAll()
    else signal?.addEventListener("abort", destroyAll, { once: true })

    try {
      await Promise.all(open.map((connection) => connection.close()))
    } finally {
      signal?.removeEventListener("abort", destroyAll)
    }
  }
}
