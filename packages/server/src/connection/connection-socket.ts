/**
 * The part of `net.Socket` a connection drives. Tests substitute an
 * in-process fake.
 */
export interface ConnectionSocket {
  readonly remoteAddress?: string | undefined
  readonly remotePort?: number | undefined

  /** Returns false when the chunk was queued in user memory. */
  write(chunk: Uint8Array): boolean
  pause(): void
  resume(): void

  /** Half-close after flushing queued writes. */
  end(): void
  destroy(): void

  on(event: "data", listener: (chunk: Buffer) => void): void
  on(event: "drain", listener: () => void): void
  on(event: "close", listener: (hadError: boolean) => void): void
  on(event: "error", listener: (err: Error) => void): void
}

export function describeRemote(socket: ConnectionSocket): string {
  if (socket.remoteAddress === undefined) return "unknown"

  return socket.remotePort === undefined
    ? socket.remoteAddress
    : `${socket.remoteAddress}:${socket.remotePort}`
}
