import { Buffer } from "node:buffer"
import { FakeClock } from "@respire/clock"
import type { SharedBytes } from "@respire/codec"
import { BaseError, ErrorCodes } from "@respire/errors"
import {
  type KeyValueStore,
  kvKeyFromBytes,
  LockedKeyValueStore,
  MemoryKeyValueStore,
} from "@respire/kv"
import { LockAbortedError, MemoryReadWriteLock } from "@respire/lock"
import type { Logger } from "@respire/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { request, wire } from "../../tests/utils/requests"
import { Dispatcher } from "../dispatcher"

describe("Dispatcher", () => {
  let logger: Mock<Logger>
  let store: KeyValueStore<SharedBytes>
  let dispatcher: Dispatcher

  beforeEach(() => {
    logger = mock<Logger>()
    store = new MemoryKeyValueStore<SharedBytes>()
    dispatcher = new Dispatcher({ store, logger })
  })

  /** Dispatch a request and return the reply's wire form. */
  async function send(...words: string[]): Promise<string> {
    return wire(await dispatcher.dispatch(request(...words)))
  }

  describe("GET", () => {
    it("replies nil for a missing key", async () => {
      expect(await send("GET", "missing")).toBe("$-1\r\n")
    })

    it("replies with the stored bytes", async () => {
      await send("SET", "greeting", "hello")

      expect(await send("GET", "greeting")).toBe("$5\r\nhello\r\n")
    })

    it("treats keys as bytes, not text", async () => {
      await send("SET", "é", "latin")

      expect(await send("GET", "é")).toBe("$5\r\nlatin\r\n")
      expect(await send("GET", "e")).toBe("$-1\r\n")
    })

    it("returns a value that keeps its bytes after the request is gone", async () => {
      await dispatcher.dispatch(request("SET", "k", "kept"))

      const reply = await dispatcher.dispatch(request("GET", "k"))

      expect(reply.kind === "data" && reply.bytes.toString()).toBe("kept")
    })
  })

  describe("SET", () => {
    it("replies okay and overwrites", async () => {
      expect(await send("SET", "k", "one")).toBe("+Ok\r\n")
      expect(await send("SET", "k", "two")).toBe("+Ok\r\n")

      expect(await send("GET", "k")).toBe("$3\r\ntwo\r\n")
    })

    it("stores an empty value", async () => {
      await send("SET", "k", "")

      expect(await send("GET", "k")).toBe("$0\r\n\r\n")
    })

    it("stores values containing CRLF", async () => {
      await send("SET", "k", "a\r\nb")

      expect(await send("GET", "k")).toBe("$4\r\na\r\nb\r\n")
    })
  })

  describe("DEL", () => {
    it("counts only the keys that existed", async () => {
      await send("SET", "a", "1")
      await send("SET", "c", "3")

      expect(await send("DEL", "a", "b", "c")).toBe(":2\r\n")
      expect(await send("GET", "a")).toBe("$-1\r\n")
      expect(await send("GET", "c")).toBe("$-1\r\n")
    })

    it("counts a key named twice once", async () => {
      await send("SET", "a", "1")

      expect(await send("DEL", "a", "a")).toBe(":1\r\n")
    })

    it("handles more than three keys", async () => {
      for (const key of ["k1", "k2", "k3", "k4"]) {
        await send("SET", key, "v")
      }

      expect(await send("DEL", "k1", "k2", "k3", "k4", "k5")).toBe(":4\r\n")
    })

    it("replies zero when nothing existed", async () => {
      expect(await send("DEL", "ghost")).toBe(":0\r\n")
    })
  })

  describe("command errors", () => {
    it.each<[string[], string]>([
      [["GET"], "-ERR wrong number of arguments for 'GET' command\r\n"],
      [["GET", "a", "b"], "-ERR wrong number of arguments for 'GET' command\r\n"],
      [["SET", "key"], "-ERR wrong number of arguments for 'SET' command\r\n"],
      [["DEL"], "-ERR wrong number of arguments for 'DEL' command\r\n"],
      [["get", "a"], "-ERR unknown command 'get'\r\n"],
      [["PING"], "-ERR unknown command 'PING'\r\n"],
      [[], "-ERR empty command\r\n"],
    ])("replies to %j with an error", async (words, expected) => {
      expect(await send(...words)).toBe(expected)
    })

    it("leaves the store untouched", async () => {
      await send("SET", "only-key")

      await expect(store.get(kvKeyFromBytes(Buffer.from("only-key")))).resolves.toStrictEqual({
        kind: "not_found",
      })
    })

    it("logs rejected commands at debug", async () => {
      await send("NOPE")

      expect(logger.debug).toHaveBeenCalledWith("Rejected command", {
        err: expect.objectContaining({ code: ErrorCodes.UnknownCommand }),
      })
    })
  })

  describe("store failures", () => {
    let failing: Mock<KeyValueStore<SharedBytes>>

    beforeEach(() => {
      failing = mock<KeyValueStore<SharedBytes>>()
      dispatcher = new Dispatcher({ store: failing, logger })
    })

    it("replies with the mapped text and warns for known errors", async () => {
      const err = new BaseError("gave up", { code: ErrorCodes.LockAborted })
      failing.get.mockRejectedValue(err)

      expect(await send("GET", "k")).toBe("-ERR server busy\r\n")
      expect(logger.warn).toHaveBeenCalledWith("Command failed", { command: "GET", err })
    })

    it("replies internal error and logs unexpected failures", async () => {
      const err = new Error("disk on fire")
      failing.deleteMany.mockRejectedValue(err)

      expect(await send("DEL", "k")).toBe("-ERR internal error\r\n")
      expect(logger.error).toHaveBeenCalledWith("Command failed unexpectedly", {
        command: "DEL",
        err,
      })
    })

    it("uses configured reply mappings", async () => {
      dispatcher = new Dispatcher(
        { store: failing, logger },
        { replies: { mappings: {}, fallback: "ERR unavailable" } },
      )
      failing.set.mockRejectedValue(new Error("boom"))

      expect(await send("SET", "k", "v")).toBe("-ERR unavailable\r\n")
    })
  })

  describe("lock timeouts", () => {
    it("replies busy when the store lock stays held past its timeout", async () => {
      const clock = new FakeClock()
      const lock = new MemoryReadWriteLock({ clock }, { defaultTimeoutMs: 100 })
      dispatcher = new Dispatcher({
        store: new LockedKeyValueStore<SharedBytes>({ store, lock }),
        logger,
      })
      const held = await lock.acquireWrite()

      const reply = send("GET", "k")
      expect(clock.pendingSleeps()).toBe(1)
      clock.advance(100)

      expect(await reply).toBe("-ERR server busy\r\n")
      expect(logger.warn).toHaveBeenCalledWith("Command failed", {
        command: "GET",
        err: expect.any(LockAbortedError),
      })

      await held?.release()
      expect(await send("GET", "k")).toBe("$-1\r\n")
    })
  })
})
