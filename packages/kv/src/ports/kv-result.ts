export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

export type KvResult<T> = KvFound<T> | KvNotFound
