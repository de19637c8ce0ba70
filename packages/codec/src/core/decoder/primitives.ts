import { ByteDecoder } from "./byte-decoder"
import { INCOMPLETE, MALFORMED, progress } from "./status"

const CR = 0x0d
const LF = 0x0a

/** Match one specific byte. */
export function byte(expected: number): ByteDecoder<number> {
  return new ByteDecoder((input) => {
    const head = input[0]

    if (head === undefined) return INCOMPLETE

    return head === expected ? progress(input.subarray(1), head) : MALFORMED
  })
}

/**
 * Match a fixed byte string. A prefix that already differs is malformed even
 * when the input is too short to hold the whole literal.
 */
export function literal(expected: Uint8Array | string): ByteDecoder<Uint8Array> {
  const bytes = typeof expected === "string" ? new TextEncoder().encode(expected) : expected.slice()

  return new ByteDecoder((input) => {
    const available = Math.min(input.length, bytes.length)

    for (let i = 0; i < available; i++) {
      if (input[i] !== bytes[i]) return MALFORMED
    }

    if (input.length < bytes.length) return INCOMPLETE

    return progress(input.subarray(bytes.length), input.subarray(0, bytes.length))
  })
}

export const anyByte: ByteDecoder<number> = new ByteDecoder((input) => {
  const head = input[0]

  return head === undefined ? INCOMPLETE : progress(input.subarray(1), head)
})

/** Any byte except CR and LF. */
export const lineSafeByte: ByteDecoder<number> = new ByteDecoder((input) => {
  const head = input[0]

  if (head === undefined) return INCOMPLETE

  return head === CR || head === LF ? MALFORMED : progress(input.subarray(1), head)
})

/**
 * Exactly `n` arbitrary bytes in one step. Same result as
 * `anyByte.skipRepeat(n).toSlice()`.
 */
export function anyBytes(n: number): ByteDecoder<Uint8Array> {
  return new ByteDecoder((input) =>
    input.length < n ? INCOMPLETE : progress(input.subarray(n), input.subarray(0, n)),
  )
}

/** Consume nothing and produce `value`. */
export function succeed<T>(value: T): ByteDecoder<T> {
  return new ByteDecoder((input) => progress(input, value))
}

export function fail<T = never>(): ByteDecoder<T> {
  return new ByteDecoder(() => MALFORMED)
}

/** Always ask for more input. */
export function halt<T = never>(): ByteDecoder<T> {
  return new ByteDecoder(() => INCOMPLETE)
}
