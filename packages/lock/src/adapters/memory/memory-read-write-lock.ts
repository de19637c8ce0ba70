import type { Sleeper } from "@respire/clock"
import { assertValidTimeoutMs } from "../../core/validation/validation"
import type { LockLease, LockMode } from "../../ports/lock-lease"
import type { AcquireOptions, ReadWriteLockConfig } from "../../ports/options"
import type { ReadWriteLock } from "../../ports/read-write-lock"
import { MemoryLease } from "./memory-lock-lease"

export type MemoryReadWriteLockDeps = {
  /** Drives acquisition timeouts. */
  clock: Sleeper
}

type Waiter = {
  mode: LockMode
  grant: (lease: LockLease) => void
}

const DEFAULT_CONFIG: ReadWriteLockConfig = { defaultTimeoutMs: Number.POSITIVE_INFINITY }

export class MemoryReadWriteLock implements ReadWriteLock {
  private readers = 0
  private writer = false
  private queue: Waiter[] = []

  public constructor(
    private readonly deps: MemoryReadWriteLockDeps,
    private readonly config: ReadWriteLockConfig = DEFAULT_CONFIG,
  ) {}

  public acquireRead(opts: AcquireOptions = {}): Promise<LockLease | null> {
    return this.acquire("read", opts)
  }

  public acquireWrite(opts: AcquireOptions = {}): Promise<LockLease | null> {
    return this.acquire("write", opts)
  }

  private async acquire(mode: LockMode, opts: AcquireOptions): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    assertValidTimeoutMs(timeoutMs, "acquire timeoutMs")

    const lease = this.tryGrant(mode)

    if (lease || timeoutMs === 0) return lease

    return this.wait(mode, timeoutMs, opts.signal)
  }

  private tryGrant(mode: LockMode): LockLease | null {
    if (this.writer || this.queue.length > 0) return null
    if (mode === "write" && this.readers > 0) return null

    return this.grant(mode)
  }

  private wait(
    mode: LockMode,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<LockLease | null> {
    const timer = new AbortController()

    return new Promise((resolve) => {
      const cleanup = () => {
        timer.abort()
        signal?.removeEventListener("abort", giveUp)
      }

      const waiter: Waiter = {
        mode,
        grant: (lease) => {
          cleanup()
          resolve(lease)
        },
      }

      const giveUp = () => {
        if (!this.queue.includes(waiter)) return

        this.queue = this.queue.filter((w) => w !== waiter)
        cleanup()
        resolve(null)

        // a writer leaving the head of the queue may unblock readers behind it
        this.drain()
      }

      signal?.addEventListener("abort", giveUp, { once: true })

      if (Number.isFinite(timeoutMs)) {
        void this.deps.clock.sleep(timeoutMs, timer.signal).then(() => {
          if (!timer.signal.aborted) giveUp()
        })
      }

      this.queue.push(waiter)
    })
  }

  private grant(mode: LockMode): LockLease {
    if (mode === "read") this.readers++
    else this.writer = true

    return new MemoryLease(mode, {
      onRelease: () => {
        if (mode === "read") this.readers--
        else this.writer = false

        this.drain()
      },
    })
  }

  private drain(): void {
    for (let next = this.queue[0]; next; next = this.queue[0]) {
      if (this.writer) return
      if (next.mode === "write" && this.readers > 0) return

      this.queue.shift()
      next.grant(this.grant(next.mode))

      if (next.mode === "write") return
    }
  }
}
