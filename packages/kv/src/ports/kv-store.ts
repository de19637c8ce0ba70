import type { KvKey } from "./kv-key"
import type { KvResult } from "./kv-result"

/**
 * In-process key-value storage.
 *
 * @remarks
 * Values are stored by reference and must not be mutated after `set`.
 * There is no expiry and no eviction: an entry lives until it is deleted.
 */
export interface KeyValueStore<T> {
  /**
   * Retrieve a value by key.
   */
  get(key: KvKey): Promise<KvResult<T>>

  /**
   * Store a value, overwriting any existing one.
   */
  set(key: KvKey, value: T): Promise<void>

  /**
   * Delete keys in order.
   *
   * @returns How many deletions removed an entry. A key listed twice counts once.
   */
  deleteMany(keys: readonly KvKey[]): Promise<number>
}
