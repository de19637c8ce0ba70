import type { Milliseconds, Sleeper } from "@respire/clock"
import { MemoryReadWriteLock } from "@respire/lock"
import { MemoryKeyValueStore } from "../../adapters/memory/memory-kv-store"
import type { KeyValueStore } from "../../ports/kv-store"
import { LockedKeyValueStore } from "./locked-kv-store"

export type LockedMemoryStoreOptions = {
  clock: Sleeper
  /**
   * How long an operation waits for its lease before failing with `lock_aborted`.
   * @default Infinity
   */
  lockTimeoutMs?: Milliseconds
}

/**
 * An in-memory store guarded by a fresh read/write lock.
 */
export function createLockedMemoryStore<T>(options: LockedMemoryStoreOptions): KeyValueStore<T> {
  const lock = new MemoryReadWriteLock(
    { clock: options.clock },
    { defaultTimeoutMs: options.lockTimeoutMs ?? Number.POSITIVE_INFINITY },
  )

  return new LockedKeyValueStore<T>({ store: new MemoryKeyValueStore<T>(), lock })
}
