import { Buffer } from "node:buffer"
import type { Value } from "../value/value"

/** Decimal digits of `n`, counting a leading minus sign. */
export function digitCount(n: number | bigint): number {
  return n.toString().length
}

const CRLF_LENGTH = 2

/**
 * Exact number of bytes `encode(value)` produces, without producing them.
 */
export function encodingLength(value: Value): number {
  const pending: Value[] = [value]
  let total = 0

  for (let next = pending.pop(); next; next = pending.pop()) {
    switch (next.kind) {
      case "nil":
      case "okay":
        total += 5
        break
      case "status":
      case "error":
        total += 1 + Buffer.byteLength(next.text, "utf8") + CRLF_LENGTH
        break
      case "int":
        total += 1 + digitCount(next.value) + CRLF_LENGTH
        break
      case "data":
        total += 1 + digitCount(next.bytes.length) + CRLF_LENGTH + next.bytes.length + CRLF_LENGTH
        break
      case "array":
        total += 1 + digitCount(next.items.length) + CRLF_LENGTH
        for (const child of next.items) pending.push(child)
        break
    }
  }

  return total
}
