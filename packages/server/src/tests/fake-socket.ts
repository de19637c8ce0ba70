import { Buffer } from "node:buffer"
import { EventEmitter } from "node:events"
import type { ConnectionSocket } from "../connection/connection-socket"

/**
 * In-process socket. `receive` plays bytes from the client; everything the
 * connection writes collects in `written`.
 */
export class FakeSocket extends EventEmitter implements ConnectionSocket {
  readonly remoteAddress = "10.0.0.7"
  readonly remotePort = 51_000

  readonly chunks: Uint8Array[] = []
  paused = false
  ended = false
  destroyed = false

  /** Make `write` report a full buffer. */
  full = false

  private closed = false

  write(chunk: Uint8Array): boolean {
    this.chunks.push(Buffer.from(chunk))
    return !this.full
  }

  pause(): void {
    this.paused = true
  }

  resume(): void {
    this.paused = false
  }

  end(): void {
    this.ended = true
    this.finish(false)
  }

  destroy(): void {
    this.destroyed = true
    this.finish(true)
  }

  receive(text: string | Uint8Array): void {
    this.emit("data", typeof text === "string" ? Buffer.from(text, "latin1") : Buffer.from(text))
  }

  /** Everything written so far, as latin1 text. */
  written(): string {
    return Buffer.concat(this.chunks).toString("latin1")
  }

  private finish(hadError: boolean): void {
    if (this.closed) return

    this.closed = true
    this.emit("close", hadError)
  }
}
