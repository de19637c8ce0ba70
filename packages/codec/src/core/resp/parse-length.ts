const MINUS = 0x2d
const ZERO = 0x30
const NINE = 0x39

/**
 * Parse an optional `-` followed by one or more ASCII digits.
 *
 * @returns `undefined` for anything else, for `-0`, and for magnitudes beyond
 * `Number.MAX_SAFE_INTEGER`.
 */
export function parseLength(text: Uint8Array): number | undefined {
  const negative = text[0] === MINUS
  const digits = negative ? text.subarray(1) : text

  if (digits.length === 0) return undefined

  let n = 0
  for (const b of digits) {
    if (b < ZERO || b > NINE) return undefined

    n = n * 10 + (b - ZERO)
    if (n > Number.MAX_SAFE_INTEGER) return undefined
  }

  if (!negative) return n

  return n === 0 ? undefined : -n
}
