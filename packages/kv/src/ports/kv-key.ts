import { Buffer } from "node:buffer"

/**
 * A key in the store.
 *
 * @remarks
 * Wire keys are arbitrary bytes. They are held as latin1 strings, which map
 * each byte to exactly one UTF-16 code unit, so distinct byte sequences
 * always yield distinct keys and `Map` lookups stay O(1).
 */
export type KvKey = string

export function kvKeyFromBytes(bytes: Uint8Array): KvKey {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1")
}
