import type { LockLease } from "./lock-lease"
import type { AcquireOptions } from "./options"

/**
 * Many concurrent readers or one exclusive writer.
 *
 * Waiters are served in arrival order: once a writer is queued, readers that
 * arrive after it wait behind it, so a steady stream of reads cannot starve writes.
 */
export interface ReadWriteLock {
  /**
   * Wait for a shared lease.
   *
   * @returns The lease, or `null` if the timeout elapsed or the signal aborted first.
   */
  acquireRead(opts?: AcquireOptions): Promise<LockLease | null>

  /**
   * Wait for an exclusive lease.
   *
   * @returns The lease, or `null` if the timeout elapsed or the signal aborted first.
   */
  acquireWrite(opts?: AcquireOptions): Promise<LockLease | null>
}
