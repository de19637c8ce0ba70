import { Buffer } from "node:buffer"
import { type Arguments, error, nil, okay, type SharedBytes, type Value } from "@respire/codec"
import { ErrorCodes } from "@respire/errors"
import { MemoryKeyValueStore } from "@respire/kv"
import { createNullLogger, type Logger } from "@respire/logger"
import { mock } from "vitest-mock-extended"
import { type CommandDispatcher, Dispatcher } from "../../dispatch/dispatcher"
import { FakeSocket } from "../../tests/fake-socket"
import type { Mock } from "../../tests/mock"
import { frame } from "../../tests/utils/requests"
import { Connection, type ConnectionOptions } from "../connection"

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

describe("Connection", () => {
  let socket: FakeSocket
  let logger: Mock<Logger>
  let dispatcher: CommandDispatcher

  beforeEach(() => {
    socket = new FakeSocket()
    logger = mock<Logger>()
    dispatcher = new Dispatcher({
      store: new MemoryKeyValueStore<SharedBytes>(),
      logger: createNullLogger(),
    })
  })

  function connect(overrides: Partial<ConnectionOptions> = {}): Connection {
    return new Connection(
      { socket, dispatcher, logger },
      { id: "conn-1", maxFrameBytes: 1024, ...overrides },
    )
  }

  describe("framing", () => {
    it("starts open", () => {
      expect(connect().getState()).toBe("open")
    })

    it("answers a request", async () => {
      connect()

      socket.receive(frame("SET", "k", "v"))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n")
    })

    it("waits for the rest of a request split across reads", async () => {
      connect()
      const bytes = frame("SET", "key", "value")

      for (const ch of bytes.slice(0, -1)) {
        socket.receive(ch)
      }
      await flush()

      expect(socket.written()).toBe("")

      socket.receive(bytes.slice(-1))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n")
    })

    it("answers every request in one read, in order", async () => {
      connect()

      socket.receive(frame("SET", "k", "v") + frame("GET", "k") + frame("DEL", "k"))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n$1\r\nv\r\n:1\r\n")
    })

    it("keeps a trailing partial request for the next read", async () => {
      connect()
      const second = frame("GET", "k")

      socket.receive(frame("SET", "k", "v") + second.slice(0, 5))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n")

      socket.receive(second.slice(5))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n$1\r\nv\r\n")
    })

    it("answers pipelined requests that arrive a few bytes at a time", async () => {
      const conn = connect()
      const bytes = frame("SET", "k", "v") + frame("GET", "k") + frame("DEL", "k", "other")

      for (let i = 0; i < bytes.length; i += 3) {
        socket.receive(bytes.slice(i, i + 3))
      }
      await flush()

      expect(socket.written()).toBe("+Ok\r\n$1\r\nv\r\n:1\r\n")
      expect(conn.getStats()).toMatchObject({ bytesReceived: bytes.length, requests: 3 })
    })

    it("keeps its own copy of a partial request", async () => {
      connect()
      const bytes = Buffer.from(frame("SET", "k", "v"), "latin1")
      const head = bytes.subarray(0, 10)

      socket.emit("data", head)
      head.fill(0)
      socket.emit("data", bytes.subarray(10))
      await flush()

      expect(socket.written()).toBe("+Ok\r\n")
    })

    it("keeps replies in request order when an earlier command is slower", async () => {
      let release: () => void = () => {}
      const gate = new Promise<void>((resolve) => {
        release = resolve
      })

      dispatcher = {
        dispatch: async (args: Arguments<SharedBytes>): Promise<Value> => {
          if (args.kind === "two" && args.b.toString() === "slow") {
            await gate
            return okay()
          }
          return nil()
        },
      }
      connect()

      socket.receive(frame("GET", "slow") + frame("GET", "fast"))
      await flush()

      expect(socket.written()).toBe("")

      release()
      await flush()

      expect(socket.written()).toBe("+Ok\r\n$-1\r\n")
    })

    it("keeps serving after a command error", async () => {
      connect()

      socket.receive(frame("SET", "k") + frame("SET", "k", "v"))
      await flush()

      expect(socket.written()).toBe("-ERR wrong number of arguments for 'SET' command\r\n+Ok\r\n")
      expect(socket.ended).toBe(false)
    })
  })

  describe("protocol errors", () => {
    it("replies and closes on a malformed frame", async () => {
      const conn = connect()

      socket.receive("*1\r\n$x\r\n")
      await flush()

      expect(socket.written()).toBe("-ERR Protocol error\r\n")
      expect(socket.ended).toBe(true)
      expect(conn.getState()).toBe("closed")
      expect(logger.warn).toHaveBeenCalledWith("Closing connection after protocol error", {
        err: expect.objectContaining({ code: ErrorCodes.ProtocolError }),
      })
    })

    it("answers earlier requests before the protocol error", async () => {
      connect()

      socket.receive(`${frame("GET", "k")}garbage\r\n`)
      await flush()

      expect(socket.written()).toBe("$-1\r\n-ERR Protocol error\r\n")
    })

    it("rejects a null element inside a request", async () => {
      connect()

      socket.receive("*2\r\n$3\r\nGET\r\n$-1\r\n")
      await flush()

      expect(socket.written()).toBe("-ERR Protocol error\r\n")
    })

    it("drops a frame that outgrows the limit", async () => {
      connect({ maxFrameBytes: 16 })

      socket.receive("*1\r\n$100\r\n")
      await flush()

      expect(socket.written()).toBe("")

      socket.receive("aaaaaaaaaa")
      await flush()

      expect(socket.written()).toBe("-ERR Protocol error\r\n")
      expect(logger.warn).toHaveBeenCalledWith("Closing connection after protocol error", {
        err: expect.objectContaining({ code: ErrorCodes.FrameTooLarge }),
      })
    })

    it("ignores bytes arriving after the error", async () => {
      const dispatch = vi.fn(dispatcher.dispatch.bind(dispatcher))
      dispatcher = { dispatch }
      connect()

      socket.receive("!bad\r\n")
      socket.receive(frame("GET", "k"))
      await flush()

      expect(dispatch).not.toHaveBeenCalled()
    })
  })

  describe("backpressure", () => {
    it("pauses reading while the socket is full and resumes on drain", async () => {
      const conn = connect()
      socket.full = true

      socket.receive(frame("GET", "k"))
      await flush()

      expect(conn.getState()).toBe("draining")
      expect(socket.paused).toBe(true)

      socket.full = false
      socket.emit("drain")

      expect(conn.getState()).toBe("open")
      expect(socket.paused).toBe(false)
    })
  })

  describe("closing", () => {
    it("flushes pending replies before ending the socket", async () => {
      let release: () => void = () => {}
      const gate = new Promise<void>((resolve) => {
        release = resolve
      })

      dispatcher = {
        dispatch: async () => {
          await gate
          return error("ERR late")
        },
      }
      const conn = connect()

      socket.receive(frame("GET", "k"))
      const closed = conn.close()

      expect(conn.getState()).toBe("closing")
      expect(socket.ended).toBe(false)

      release()
      await closed

      expect(socket.written()).toBe("-ERR late\r\n")
      expect(socket.ended).toBe(true)
      expect(conn.getState()).toBe("closed")
    })

    it("returns the same promise when closed twice", () => {
      const conn = connect()

      expect(conn.close()).toBe(conn.close())
    })

    it("destroy drops the socket at once", async () => {
      const onClose = vi.fn()
      const conn = connect({ onClose })

      await conn.destroy()

      expect(socket.destroyed).toBe(true)
      expect(onClose).toHaveBeenCalledExactlyOnceWith(conn)
    })

    it("notices the client hanging up", () => {
      const onClose = vi.fn()
      const conn = connect({ onClose })

      socket.emit("close", false)
      socket.emit("close", false)

      expect(conn.getState()).toBe("closed")
      expect(onClose).toHaveBeenCalledOnce()
    })

    it("logs socket errors", () => {
      connect()
      const err = new Error("ECONNRESET")

      socket.emit("error", err)

      expect(logger.warn).toHaveBeenCalledWith("Socket error", { err })
    })

    it("destroys the socket when answering fails", async () => {
      const err = new Error("broken dispatcher")
      dispatcher = { dispatch: () => Promise.reject(err) }
      connect()

      socket.receive(frame("GET", "k"))
      await flush()

      expect(logger.error).toHaveBeenCalledWith("Failed to answer request", { err })
      expect(socket.destroyed).toBe(true)
    })
  })

  describe("stats", () => {
    it("counts bytes both ways and requests", async () => {
      const conn = connect()
      const bytes = frame("SET", "k", "v")

      socket.receive(bytes + frame("GET", "k"))
      await flush()

      expect(conn.getStats()).toStrictEqual({
        bytesReceived: bytes.length + frame("GET", "k").length,
        bytesSent: "+Ok\r\n".length + "$1\r\nv\r\n".length,
        requests: 2,
      })
    })
  })
})
