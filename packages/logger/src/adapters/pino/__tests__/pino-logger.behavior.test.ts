import { describe, expect, it } from "vitest"
import { createLogger } from "../../create"
import { NullLogger } from "../../null/null-logger"
import { PinoLogger } from "../pino-logger"
import { makeLineDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("emits JSON with bindings to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { level: "trace", prettify: false },
      { service: "respire" },
      { destination },
    )

    logger.info("listening", { remoteAddress: "127.0.0.1:50000" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "listening",
      service: "respire",
      remoteAddress: "127.0.0.1:50000",
      level: 30,
    })
    expect(typeof lines[0]?.time).toBe("number")
  })

  it("child() inherits the sink and level of its parent", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { level: "warn", prettify: false },
      { service: "respire" },
      { destination },
    )
    const child = base.child({ connectionId: "conn-7" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "logged",
      service: "respire",
      connectionId: "conn-7",
    })
  })

  it("serializes errors under err, including the cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ level: "info" }, {}, { destination })

    const cause = new Error("socket reset")
    logger.error("write failed", { err: new Error("reply lost", { cause }) })

    const err = lines[0]?.err

    expect(err).toMatchObject({ type: "Error", message: "reply lost" })
    expect(err).toHaveProperty("cause")
  })
})

describe("createLogger", () => {
  it("returns a NullLogger when silent", () => {
    expect(createLogger({ level: "info", silent: true })).toBeInstanceOf(NullLogger)
  })

  it("returns a PinoLogger bound to the given fields", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createLogger(
      { level: "debug", bindings: { service: "respire", env: "test" } },
      { destination },
    )
    logger.debug("ready")

    expect(logger).toBeInstanceOf(PinoLogger)
    expect(lines[0]).toMatchObject({ msg: "ready", service: "respire", env: "test" })
  })
})
