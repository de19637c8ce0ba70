import { type Arguments, append, NO_ARGS } from "../arguments/arguments"
import type { ByteDecoder } from "../decoder/byte-decoder"
import { anyBytes, byte, fail, lineSafeByte, literal, succeed } from "../decoder/primitives"
import { parseLength } from "./parse-length"

const BULK = 0x24 // $
const ARRAY = 0x2a // *

const NULL_LENGTH = -1

const crlf = literal("\r\n")

/** `<marker><integer>\r\n`, yielding the integer. */
function header(marker: number): ByteDecoder<number> {
  return byte(marker)
    .and(lineSafeByte.skipMany().parseSlice(parseLength))
    .filterMap((n) => n)
    .skip(crlf)
}

const bulkHeader = header(BULK)
const arrayHeader = header(ARRAY).filter((n) => n >= 0)

function payload(n: number): ByteDecoder<Uint8Array> {
  return anyBytes(n).skip(crlf)
}

/**
 * A bulk string; `$-1\r\n` is the null bulk and yields `null`.
 * The payload is a view into the input.
 */
export function bulkString(): ByteDecoder<Uint8Array | null> {
  return bulkHeader.andThen((n): ByteDecoder<Uint8Array | null> => {
    if (n === NULL_LENGTH) return succeed(null)

    return n < 0 ? fail() : payload(n)
  })
}

/** A bulk string inside a request, where null is not allowed. */
const requestBulk: ByteDecoder<Uint8Array> = bulkHeader.filter((n) => n >= 0).andThen(payload)

/**
 * A request: an array of non-null bulk strings, each a view into the input.
 */
export function bulkStringArray(): ByteDecoder<Arguments<Uint8Array>> {
  return arrayHeader.andThen((n) =>
    requestBulk.reduceRepeat(n, (): Arguments<Uint8Array> => NO_ARGS, append),
  )
}

/** Validate a bulk string and report its encoded length. */
export function checkBulkString(): ByteDecoder<number> {
  return bulkString().countBytes()
}

/**
 * Validate a whole request frame and report its encoded length, without
 * collecting any of its contents.
 */
export function checkArray(): ByteDecoder<number> {
  return arrayHeader.andThen((n) => requestBulk.skipRepeat(n)).countBytes()
}

export function sliceBulkString(): ByteDecoder<Uint8Array> {
  return bulkString().toSlice()
}

export function sliceArray(): ByteDecoder<Uint8Array> {
  return arrayHeader.andThen((n) => requestBulk.skipRepeat(n)).toSlice()
}
