export type DecodeProgress<T> = {
  readonly kind: "progress"
  /** Unconsumed suffix of the input. Always a view, never a copy. */
  readonly remaining: Uint8Array
  readonly output: T
}

/** More bytes are needed before a verdict can be reached. */
export type DecodeIncomplete = { readonly kind: "incomplete" }

/** The input can never be decoded, whatever follows. */
export type DecodeMalformed = { readonly kind: "malformed" }

export type DecodeFailure = DecodeIncomplete | DecodeMalformed

export type DecodeStatus<T> = DecodeProgress<T> | DecodeFailure

/**
 * A pure function of its input.
 *
 * @remarks
 * Decoding the same bytes twice yields the same status, and a failure never
 * leaves anything behind, so a caller that got `incomplete` can retry with a
 * longer prefix of the same stream.
 */
export interface Decoder<T> {
  decode(input: Uint8Array): DecodeStatus<T>
}
