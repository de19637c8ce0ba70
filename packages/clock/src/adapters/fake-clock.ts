import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingSleep = {
  wakeAt: UnixMs
  resolve: () => void
}

/**
 * Manually driven clock. `sleep()` resolves once `advance()`/`set()` moves
 * time past its wake-up point, or when its signal aborts.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private sleeping: PendingSleep[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps still waiting for time to move. */
  pendingSleeps(): number {
    return this.sleeping.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.sleeping = this.sleeping.filter((s) => s !== entry)
        resolve()
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.sleeping.push(entry)
    })
  }

  private wakeDue(): void {
    const due = this.sleeping.filter((s) => s.wakeAt <= this.time)
    if (!due.length) return

    this.sleeping = this.sleeping.filter((s) => s.wakeAt > this.time)
    for (const s of due) s.resolve()
  }
}
