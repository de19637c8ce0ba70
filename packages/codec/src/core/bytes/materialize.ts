import { type Arguments, iterateArguments, mapArguments } from "../arguments/arguments"
import { SharedArena, SharedBytes } from "./shared-bytes"

/**
 * Copy borrowed slices into one new buffer and hand out views into it.
 *
 * The slices usually alias a receive buffer that the next read overwrites;
 * once this returns, that buffer can be reused freely.
 */
export function materialize(args: Arguments<Uint8Array>): Arguments<SharedBytes> {
  let total = 0
  for (const slice of iterateArguments(args)) total += slice.byteLength

  const bytes = new Uint8Array(total)
  let offset = 0
  for (const slice of iterateArguments(args)) {
    bytes.set(slice, offset)
    offset += slice.byteLength
  }

  const arena = new SharedArena(bytes)
  let start = 0

  return mapArguments(args, (slice) => {
    const view = new SharedBytes(arena, start, start + slice.byteLength)
    start += slice.byteLength
    return view
  })
}
