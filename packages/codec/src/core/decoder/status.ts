import type { DecodeIncomplete, DecodeMalformed, DecodeProgress } from "../../ports/decoder"

export const INCOMPLETE: DecodeIncomplete = Object.freeze({ kind: "incomplete" })

export const MALFORMED: DecodeMalformed = Object.freeze({ kind: "malformed" })

export function progress<T>(remaining: Uint8Array, output: T): DecodeProgress<T> {
  return { kind: "progress", remaining, output }
}

export function consumed(input: Uint8Array, remaining: Uint8Array): number {
  return input.length - remaining.length
}
