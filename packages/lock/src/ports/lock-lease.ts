export type LockMode = "read" | "write"

export interface LockLease {
  readonly mode: LockMode

  /** `true` once `release()` has run. */
  readonly released: boolean

  /**
   * Give the lock back. Idempotent: safe to call multiple times.
   */
  release(): Promise<void>
}
