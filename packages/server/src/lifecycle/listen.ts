import net from "node:net"
import type { Logger } from "@respire/logger"
import type { Closeable } from "./shutdown"

export type BoundAddress = { host: string; port: number }

export type ListenOptions = {
  host: string
  /** 0 picks a free port. */
  port: number
}

export type Listener = {
  server: Closeable
  address: BoundAddress
}

/**
 * Bind a TCP listener and hand every accepted socket to `onConnection`.
 * Resolves once bound; rejects when binding fails.
 */
export function listen(
  options: ListenOptions,
  onConnection: (socket: net.Socket) => void,
  logger: Logger,
): Promise<Listener> {
  const server = net.createServer({ noDelay: true }, onConnection)

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err)

    server.once("error", onError)

    server.listen({ host: options.host, port: options.port }, () => {
      server.off("error", onError)
      server.on("error", (err) => logger.error("Listener error", { err }))

      const address = boundAddress(server, options)

      logger.info(`Server listening on ${address.host}:${address.port}`)

      resolve({ server, address })
    })
  })
}

export type ListenFn = typeof listen

function boundAddress(server: net.Server, fallback: ListenOptions): BoundAddress {
  const info = server.address()

  if (info === null || typeof info === "string") return { host: fallback.host, port: fallback.port }

  return { host: info.address, port: info.port }
}
