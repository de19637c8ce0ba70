import type { KvKey } from "../../ports/kv-key"
import type { KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"

/**
 * Map-backed store. Every operation completes synchronously; the promises only
 * satisfy the port, so callers never observe a partially applied batch.
 */
export class MemoryKeyValueStore<T> implements KeyValueStore<T> {
  private readonly store = new Map<KvKey, { readonly value: T }>()

  async get(key: KvKey): Promise<KvResult<T>> {
    const entry = this.store.get(key)

    return entry ? { kind: "found", value: entry.value } : { kind: "not_found" }
  }

  async set(key: KvKey, value: T): Promise<void> {
    this.store.set(key, { value })
  }

  async deleteMany(keys: readonly KvKey[]): Promise<number> {
    let removed = 0

    for (const key of keys) {
      if (this.store.delete(key)) removed++
    }

    return removed
  }
}
