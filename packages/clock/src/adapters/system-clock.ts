import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class SystemClock implements Clock {
  nowMs(): UnixMs {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      // a pending lock timeout must not hold the process open
      timer.unref()

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
