import { FakeClock } from "@respire/clock"
import type { Logger } from "@respire/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import type { LifecycleHook } from "../lifecycle-hook"
import { startup } from "../startup"

describe("startup", () => {
  let logger: Mock<Logger>
  let clock: FakeClock

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(0)
  })

  it("logs that startup hooks are running", async () => {
    await startup({ clock, logger, deadlineMs: 10_000, startHooks: [] })

    expect(logger.debug).toHaveBeenCalledWith("Running startup hooks...")
  })

  it("is ok when every hook succeeds before the deadline", async () => {
    const hooks: LifecycleHook[] = [
      { name: "a", fn: async () => {} },
      { name: "b", fn: async () => {} },
    ]

    const res = await startup({ clock, logger, deadlineMs: 10_000, startHooks: hooks })

    expect(res).toStrictEqual({ ok: true, failures: [], timedOut: false })
  })

  it("stops at the first failure", async () => {
    const ran: string[] = []

    const hooks: LifecycleHook[] = [
      {
        name: "first",
        fn: async () => {
          ran.push("first")
          throw new Error("boom")
        },
      },
      { name: "second", fn: async () => void ran.push("second") },
    ]

    const res = await startup({ clock, logger, deadlineMs: 10_000, startHooks: hooks })

    expect(ran).toStrictEqual(["first"])
    expect(res.ok).toBe(false)
    expect(res.timedOut).toBe(false)
    expect(res.failures.map((f) => f.hook)).toStrictEqual(["first"])
  })

  it("is not ok when the deadline has already passed", async () => {
    clock.set(1_000)

    const res = await startup({
      clock,
      logger,
      deadlineMs: 1_000,
      startHooks: [{ name: "late", fn: async () => {} }],
    })

    expect(res).toStrictEqual({ ok: false, failures: [], timedOut: true })
  })
})
