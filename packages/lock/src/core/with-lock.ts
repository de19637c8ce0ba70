import { BaseError, ErrorCodes } from "@respire/errors"
import type { LockMode } from "../ports/lock-lease"
import type { ReadWriteLock } from "../ports/read-write-lock"

export class LockAbortedError extends BaseError<typeof ErrorCodes.LockAborted> {
  constructor(mode: LockMode) {
    super(`Failed to acquire ${mode} lock`, {
      code: ErrorCodes.LockAborted,
      context: { mode },
      isRetryable: true,
    })
  }
}

/**
 * Run `fn` while holding a lease of the given mode, releasing it afterwards
 * even if `fn` throws. The lock's default timeout bounds the wait.
 *
 * @throws LockAbortedError when the lease could not be obtained in time.
 */
export async function withLock<T>(
  lock: ReadWriteLock,
  mode: LockMode,
  fn: () => T | Promise<T>,
): Promise<T> {
  const lease = mode === "read" ? await lock.acquireRead() : await lock.acquireWrite()

  if (!lease) throw new LockAbortedError(mode)

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}

export function withReadLock<T>(lock: ReadWriteLock, fn: () => T | Promise<T>): Promise<T> {
  return withLock(lock, "read", fn)
}

export function withWriteLock<T>(lock: ReadWriteLock, fn: () => T | Promise<T>): Promise<T> {
  return withLock(lock, "write", fn)
}
