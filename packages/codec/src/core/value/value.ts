import { BaseError, ErrorCodes } from "@respire/errors"
import { SharedBytes } from "../bytes/shared-bytes"

declare const simpleTextBrand: unique symbol

/** Text that fits on a single wire line: no CR, no LF. */
export type SimpleText = string & { readonly [simpleTextBrand]: true }

export type Value =
  | { readonly kind: "nil" }
  | { readonly kind: "okay" }
  | { readonly kind: "status"; readonly text: SimpleText }
  | { readonly kind: "error"; readonly text: SimpleText }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "data"; readonly bytes: SharedBytes }
  | { readonly kind: "array"; readonly items: readonly Value[] }

export type ValueKind = Value["kind"]

export const INT64_MIN = -(2n ** 63n)
export const INT64_MAX = 2n ** 63n - 1n

export class InvalidValueError extends BaseError<typeof ErrorCodes.InvalidValue> {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, { code: ErrorCodes.InvalidValue, context })
  }
}

export function isSimpleText(text: string): text is SimpleText {
  return !text.includes("\r") && !text.includes("\n")
}

/**
 * @throws InvalidValueError if `text` contains CR or LF.
 */
export function simpleText(text: string): SimpleText {
  if (!isSimpleText(text)) {
    throw new InvalidValueError("Simple text must not contain CR or LF", { text })
  }

  return text
}

const NIL: Value = Object.freeze({ kind: "nil" })
const OKAY: Value = Object.freeze({ kind: "okay" })

export function nil(): Value {
  return NIL
}

export function okay(): Value {
  return OKAY
}

export function status(text: string): Value {
  return { kind: "status", text: simpleText(text) }
}

export function error(text: string): Value {
  return { kind: "error", text: simpleText(text) }
}

/**
 * @throws InvalidValueError for non-integers and values outside signed 64 bits.
 */
export function int(n: bigint | number): Value {
  if (typeof n === "number" && !Number.isSafeInteger(n)) {
    throw new InvalidValueError("Integer replies need a safe integer", { value: n })
  }

  const value = BigInt(n)

  if (value < INT64_MIN || value > INT64_MAX) {
    throw new InvalidValueError("Integer reply out of signed 64-bit range", {
      value: value.toString(),
    })
  }

  return { kind: "int", value }
}

/**
 * Bulk data. Plain byte arrays and strings are copied into an arena of their
 * own; `SharedBytes` are kept as is.
 */
export function data(bytes: SharedBytes | Uint8Array | string): Value {
  return { kind: "data", bytes: bytes instanceof SharedBytes ? bytes : SharedBytes.copyOf(bytes) }
}

export function array(items: readonly Value[]): Value {
  return { kind: "array", items: [...items] }
}
