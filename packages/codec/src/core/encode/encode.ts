import type { Value } from "../value/value"
import { encodingLength } from "./encoding-length"
import { GrowableBuffer } from "./growable-buffer"

const CR = 0x0d
const LF = 0x0a

export const Marker = {
  Status: 0x2b, // +
  Error: 0x2d, // -
  Int: 0x3a, // :
  Bulk: 0x24, // $
  Array: 0x2a, // *
} as const

const NIL_BYTES = new TextEncoder().encode("$-1\r\n")
const OKAY_BYTES = new TextEncoder().encode("+Ok\r\n")

/**
 * One step of the wire form of a value.
 *
 * `enclosed` is marker, optional length line, payload and CRLF; `prefix` is
 * the header of an array whose items follow as their own steps.
 */
export type EncodeItem =
  | { readonly kind: "static"; readonly bytes: Uint8Array }
  | { readonly kind: "prefix"; readonly marker: number; readonly count: number }
  | {
      readonly kind: "enclosed"
      readonly marker: number
      readonly length?: number
      readonly payload: Uint8Array | string
    }

function itemFor(value: Value): EncodeItem {
  switch (value.kind) {
    case "nil":
      return { kind: "static", bytes: NIL_BYTES }
    case "okay":
      return { kind: "static", bytes: OKAY_BYTES }
    case "status":
      return { kind: "enclosed", marker: Marker.Status, payload: value.text }
    case "error":
      return { kind: "enclosed", marker: Marker.Error, payload: value.text }
    case "int":
      return { kind: "enclosed", marker: Marker.Int, payload: value.value.toString() }
    case "data":
      return {
        kind: "enclosed",
        marker: Marker.Bulk,
        length: value.bytes.length,
        payload: value.bytes.view(),
      }
    case "array":
      return { kind: "prefix", marker: Marker.Array, count: value.items.length }
  }
}

/**
 * The wire form of `value` as a lazy sequence of items, depth first.
 *
 * Walks an explicit stack instead of recursing, so nesting depth only
 * costs stack entries.
 */
export function* encodingItems(value: Value): Generator<EncodeItem, void, undefined> {
  const pending: Value[] = [value]

  for (let next = pending.pop(); next; next = pending.pop()) {
    yield itemFor(next)

    if (next.kind === "array") {
      for (let i = next.items.length - 1; i >= 0; i--) {
        const child = next.items[i]
        if (child) pending.push(child)
      }
    }
  }
}

function writeCrlf(buffer: GrowableBuffer): void {
  buffer.putByte(CR)
  buffer.putByte(LF)
}

export function writeItem(buffer: GrowableBuffer, item: EncodeItem): void {
  switch (item.kind) {
    case "static":
      buffer.put(item.bytes)
      return
    case "prefix":
      buffer.putByte(item.marker)
      buffer.putAscii(item.count.toString())
      writeCrlf(buffer)
      return
    case "enclosed":
      buffer.putByte(item.marker)
      if (item.length !== undefined) {
        buffer.putAscii(item.length.toString())
        writeCrlf(buffer)
      }
      if (typeof item.payload === "string") buffer.putUtf8(item.payload)
      else buffer.put(item.payload)
      writeCrlf(buffer)
      return
  }
}

/**
 * Append the wire form of `value`, growing `buffer` at most once.
 */
export function encodeInto(value: Value, buffer: GrowableBuffer): void {
  buffer.reserve(encodingLength(value))

  for (const item of encodingItems(value)) {
    writeItem(buffer, item)
  }
}

export function encode(value: Value): Uint8Array {
  const buffer = new GrowableBuffer(encodingLength(value))
  encodeInto(value, buffer)

  return buffer.bytes()
}
