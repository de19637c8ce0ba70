import type { Milliseconds } from "@respire/clock"

export type AcquireOptions = {
  /** Max time to wait. Falls back to `ReadWriteLockConfig.defaultTimeoutMs` if omitted. */
  timeoutMs?: Milliseconds

  /** Aborts the wait early. Has no effect once the lock is granted. */
  signal?: AbortSignal
}

export type ReadWriteLockConfig = {
  /**
   * Default wait for `acquireRead()`/`acquireWrite()` when `timeoutMs` is omitted.
   * `Infinity` waits until granted or aborted.
   */
  defaultTimeoutMs: Milliseconds
}
