export {
  MemoryReadWriteLock,
  type MemoryReadWriteLockDeps,
} from "./adapters/memory/memory-read-write-lock"
export { LockAbortedError, withLock, withReadLock, withWriteLock } from "./core/with-lock"
export type { LockLease, LockMode } from "./ports/lock-lease"
export type { AcquireOptions, ReadWriteLockConfig } from "./ports/options"
export type { ReadWriteLock } from "./ports/read-write-lock"
