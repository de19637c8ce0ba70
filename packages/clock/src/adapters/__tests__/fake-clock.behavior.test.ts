import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("only moves when told to", () => {
    const clock = new FakeClock(1_000)

    clock.advance(250)
    expect(clock.nowMs()).toBe(1_250)

    clock.set(5_000)
    expect(clock.nowMs()).toBe(5_000)
  })

  it("sleep() resolves once time reaches the wake-up point", async () => {
    const clock = new FakeClock(0)
    let woke = false

    const p = clock.sleep(100).then(() => {
      woke = true
    })

    clock.advance(99)
    await Promise.resolve()
    expect(woke).toBe(false)
    expect(clock.pendingSleeps()).toBe(1)

    clock.advance(1)
    await p
    expect(woke).toBe(true)
    expect(clock.pendingSleeps()).toBe(0)
  })

  it("wakes every sleep that set() jumps past", async () => {
    const clock = new FakeClock(0)

    const early = clock.sleep(10)
    const late = clock.sleep(1_000)
    clock.set(500)

    await early
    expect(clock.pendingSleeps()).toBe(1)

    clock.set(1_000)
    await late
    expect(clock.pendingSleeps()).toBe(0)
  })

  it("sleep() resolves early on abort and forgets the sleeper", async () => {
    const clock = new FakeClock(0)
    const ac = new AbortController()

    const p = clock.sleep(10_000, ac.signal)
    ac.abort()

    await expect(p).resolves.toBeUndefined()
    expect(clock.pendingSleeps()).toBe(0)
  })
})
