import { type ReadWriteLock, withReadLock, withWriteLock } from "@respire/lock"
import type { KvKey } from "../../ports/kv-key"
import type { KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"

export type LockedKeyValueStoreDeps<T> = {
  store: KeyValueStore<T>
  lock: ReadWriteLock
}

/**
 * Serializes access to an inner store: lookups share a read lease, mutations
 * take the write lease. A `deleteMany` runs under a single lease, so no reader
 * sees half of it.
 *
 * @throws LockAbortedError from any method when a lease cannot be obtained
 * within the lock's timeout.
 */
export class LockedKeyValueStore<T> implements KeyValueStore<T> {
  public constructor(private readonly deps: LockedKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    return withReadLock(this.deps.lock, () => this.deps.store.get(key))
  }

  async set(key: KvKey, value: T): Promise<void> {
    await withWriteLock(this.deps.lock, () => this.deps.store.set(key, value))
  }

  async deleteMany(keys: readonly KvKey[]): Promise<number> {
    return withWriteLock(this.deps.lock, () => this.deps.store.deleteMany(keys))
  }
}
