import {
  type Arguments,
  decodeRequest,
  encode,
  GrowableBuffer,
  type SharedBytes,
} from "@respire/codec"
import type { AppError } from "@respire/errors"
import type { Logger } from "@respire/logger"
import type { CommandDispatcher } from "../dispatch/dispatcher"
import { FrameTooLargeError, ProtocolError } from "../errors/protocol-errors"
import type { ConnectionSocket } from "./connection-socket"

/**
 * init → open ⇄ draining → closing → closed
 *
 * `draining` means the socket refused a write and reading is paused until it
 * empties. `closing` accepts no more requests but still flushes replies.
 */
export type ConnectionState = "init" | "open" | "draining" | "closing" | "closed"

export type ConnectionStats = {
  bytesReceived: number
  bytesSent: number
  requests: number
}

export type ConnectionDeps = {
  socket: ConnectionSocket
  dispatcher: CommandDispatcher
  logger: Logger
}

export type ConnectionOptions = {
  id: string
  maxFrameBytes: number
  onClose?: (connection: Connection) => void
}

const RECEIVE_BUFFER_BYTES = 4096

const PROTOCOL_ERROR_REPLY = new TextEncoder().encode("-ERR Protocol error\r\n")

/**
 * One client socket.
 *
 * Reads accumulate in a receive buffer. Each complete request at its front is
 * decoded, dispatched and answered, and replies go out in request order.
 * Decoded requests own their bytes, so consumed input is dropped from the
 * buffer straight away.
 */
export class Connection {
  readonly id: string

  private state: ConnectionState = "init"
  private readonly recv = new GrowableBuffer(RECEIVE_BUFFER_BYTES)
  private replies: Promise<void> = Promise.resolve()
  private readonly stats: ConnectionStats = { bytesReceived: 0, bytesSent: 0, requests: 0 }

  private readonly closed: Promise<void>
  private markClosed: () => void = () => {}

  constructor(
    private readonly deps: ConnectionDeps,
    private readonly opts: ConnectionOptions,
  ) {
    this.id = opts.id
    this.closed = new Promise((resolve) => {
      this.markClosed = resolve
    })

    this.wireSocket()
    this.transition("open")
  }

  getState(): ConnectionState {
    return this.state
  }

  getStats(): ConnectionStats {
    return { ...this.stats }
  }

  /**
   * Stop taking requests, flush pending replies, then end the socket.
   * Resolves once the socket has closed.
   */
  close(): Promise<void> {
    if (this.state === "closing" || this.state === "closed") return this.closed

    this.transition("closing")
    this.recv.clear()
    this.enqueue(() => this.deps.socket.end())

    return this.closed
  }

  /** Drop the socket without flushing. */
  destroy(): Promise<void> {
    if (this.state !== "closed") this.deps.socket.destroy()

    return this.closed
  }

  private wireSocket(): void {
    const { socket, logger } = this.deps

    socket.on("data", (chunk) => this.onData(chunk))

    socket.on("drain", () => {
      if (this.state !== "draining") return

      this.transition("open")
      socket.resume()
    })

    socket.on("error", (err) => {
      logger.warn("Socket error", { err })
    })

    socket.on("close", () => this.onClose())
  }

  private onData(chunk: Uint8Array): void {
    if (this.state === "closing" || this.state === "closed") return

    this.stats.bytesReceived += chunk.length
    this.recv.put(chunk)

    this.takeFrames()
  }

  private takeFrames(): void {
    let input = this.recv.bytes()
    let step = decodeRequest(input)

    while (step.kind === "progress") {
      input = step.remaining
      this.stats.requests++

      const args = step.output
      this.enqueue(() => this.respond(args))

      step = decodeRequest(input)
    }

    if (step.kind === "malformed") return this.fail(new ProtocolError(input.length))

    if (input.length > this.opts.maxFrameBytes) {
      return this.fail(new FrameTooLargeError(input.length, this.opts.maxFrameBytes))
    }

    this.recv.discard(this.recv.length - input.length)
  }

  private async respond(args: Arguments<SharedBytes>): Promise<void> {
    const reply = await this.deps.dispatcher.dispatch(args)

    this.send(encode(reply))
  }

  private fail(err: AppError): void {
    this.deps.logger.warn("Closing connection after protocol error", { err })

    this.enqueue(() => this.send(PROTOCOL_ERROR_REPLY))
    void this.close()
  }

  private enqueue(task: () => Promise<void> | void): void {
    this.replies = this.replies.then(task).catch((err: unknown) => {
      this.deps.logger.error("Failed to answer request", { err })
      this.deps.socket.destroy()
    })
  }

  private send(bytes: Uint8Array): void {
    if (this.state === "closed") return

    const flushed = this.deps.socket.write(bytes)
    this.stats.bytesSent += bytes.length

    if (!flushed && this.state === "open") {
      this.transition("draining")
      this.deps.socket.pause()
    }
  }

  private onClose(): void {
    if (this.state === "closed") return

    this.transition("closed")
    this.recv.clear()

    this.deps.logger.debug("Connection closed", { ...this.stats })
    this.opts.onClose?.(this)
    this.markClosed()
  }

  private transition(next: ConnectionState): void {
    this.deps.logger.trace("Connection state", { from: this.state, to: next })
    this.state = next
  }
}
