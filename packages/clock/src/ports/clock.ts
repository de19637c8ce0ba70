import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds. Resolves early, and releases its
   * timer, if `signal` is aborted.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
