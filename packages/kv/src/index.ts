export { MemoryKeyValueStore } from "./adapters/memory/memory-kv-store"
export {
  createLockedMemoryStore,
  type LockedMemoryStoreOptions,
} from "./core/locked/create-locked-store"
export { LockedKeyValueStore, type LockedKeyValueStoreDeps } from "./core/locked/locked-kv-store"
export { type KvKey, kvKeyFromBytes } from "./ports/kv-key"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
