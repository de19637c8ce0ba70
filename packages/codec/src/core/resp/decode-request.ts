import type { DecodeStatus } from "../../ports/decoder"
import type { Arguments } from "../arguments/arguments"
import type { SharedBytes } from "../bytes/shared-bytes"
import { materialize } from "../bytes/materialize"
import { progress } from "../decoder/status"
import { bulkStringArray, checkArray } from "./grammar"

const frameLength = checkArray()
const frame = bulkStringArray()

/**
 * Take one request off the front of `input`.
 *
 * The frame is measured first, so an incomplete frame costs no allocation.
 * On progress the arguments own their bytes and `input` may be overwritten.
 */
export function decodeRequest(input: Uint8Array): DecodeStatus<Arguments<SharedBytes>> {
  const checked = frameLength.decode(input)
  if (checked.kind !== "progress") return checked

  const parsed = frame.decodeExact(input.subarray(0, checked.output))
  if (parsed.kind !== "progress") return parsed

  return progress(checked.remaining, materialize(parsed.output))
}
