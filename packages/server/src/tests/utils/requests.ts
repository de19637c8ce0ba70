import { Buffer } from "node:buffer"
import { type Arguments, argumentsFrom, encode, materialize, type SharedBytes, type Value } from "@respire/codec"

/** A materialized request made of the given words. */
export function request(...words: string[]): Arguments<SharedBytes> {
  return materialize(argumentsFrom(words.map((w) => Buffer.from(w, "latin1"))))
}

/** The wire form of a request, as a client sends it. */
export function frame(...words: string[]): string {
  const parts = words.map((w) => `$${Buffer.byteLength(w, "latin1")}\r\n${w}\r\n`)

  return `*${words.length}\r\n${parts.join("")}`
}

export function wire(value: Value): string {
  return Buffer.from(encode(value)).toString("latin1")
}
