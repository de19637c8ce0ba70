import type { DecodeStatus, Decoder } from "../../ports/decoder"
import { consumed, INCOMPLETE, MALFORMED, progress } from "./status"

type DecodeFn<T> = (input: Uint8Array) => DecodeStatus<T>

/**
 * Fluent decoder over byte slices.
 *
 * Every combinator returns a new decoder and leaves its receiver untouched.
 * `incomplete` always passes through unchanged: only `malformed` is ever
 * recovered from (by `or`, or by `many` ending its run).
 */
export class ByteDecoder<T> implements Decoder<T> {
  public constructor(private readonly run: DecodeFn<T>) {}

  public decode(input: Uint8Array): DecodeStatus<T> {
    return this.run(input)
  }

  /**
   * Decode and require that nothing is left over.
   */
  public decodeExact(input: Uint8Array): DecodeStatus<T> {
    const step = this.run(input)

    if (step.kind === "progress" && step.remaining.length > 0) return MALFORMED

    return step
  }

  public map<U>(f: (value: T) => U): ByteDecoder<U> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      return progress(step.remaining, f(step.output))
    })
  }

  /**
   * Like `map`, but an `undefined` result turns the success into `malformed`.
   */
  public filterMap<U>(f: (value: T) => U | undefined): ByteDecoder<U> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      const output = f(step.output)

      return output === undefined ? MALFORMED : progress(step.remaining, output)
    })
  }

  public filter(predicate: (value: T) => boolean): ByteDecoder<T> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      return predicate(step.output) ? step : MALFORMED
    })
  }

  /** Sequence; keep the output of `next`. */
  public and<U>(next: Decoder<U>): ByteDecoder<U> {
    return this.andThen(() => next)
  }

  /** Sequence; keep this decoder's output. */
  public skip<U>(next: Decoder<U>): ByteDecoder<T> {
    return this.andThenSkip(() => next)
  }

  /**
   * Run the decoder chosen by this one's output on the remaining input.
   */
  public andThen<U>(f: (value: T) => Decoder<U>): ByteDecoder<U> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      return f(step.output).decode(step.remaining)
    })
  }

  public andThenSkip<U>(f: (value: T) => Decoder<U>): ByteDecoder<T> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      const next = f(step.output).decode(step.remaining)
      if (next.kind !== "progress") return next

      return progress(next.remaining, step.output)
    })
  }

  /**
   * Try `alt` on the same input when this decoder is malformed. An incomplete
   * result is returned as is: more bytes might still make this branch match.
   */
  public or<U>(alt: Decoder<U>): ByteDecoder<T | U> {
    return this.orElse(() => alt)
  }

  public orElse<U>(alt: () => Decoder<U>): ByteDecoder<T | U> {
    return new ByteDecoder<T | U>((input) => {
      const step = this.run(input)

      return step.kind === "malformed" ? alt().decode(input) : step
    })
  }

  /**
   * Zero or more repetitions, stopping at the first malformed attempt.
   *
   * A repetition that succeeds without consuming anything also ends the run,
   * and its output is dropped; otherwise it would match forever.
   */
  public many(): ByteDecoder<T[]> {
    return new ByteDecoder((input) => {
      const out: T[] = []
      let rest = input

      for (;;) {
        const step = this.run(rest)

        if (step.kind === "incomplete") return step
        if (step.kind === "malformed" || step.remaining.length === rest.length) {
          return progress(rest, out)
        }

        out.push(step.output)
        rest = step.remaining
      }
    })
  }

  public skipMany(): ByteDecoder<undefined> {
    return new ByteDecoder((input) => {
      let rest = input

      for (;;) {
        const step = this.run(rest)

        if (step.kind === "incomplete") return step
        if (step.kind === "malformed" || step.remaining.length === rest.length) {
          return progress(rest, undefined)
        }

        rest = step.remaining
      }
    })
  }

  /**
   * Exactly `n` repetitions. Any failure before the `n`th, including
   * `incomplete`, is the result.
   */
  public repeat(n: number): ByteDecoder<T[]> {
    return this.reduceRepeat(
      n,
      (): T[] => [],
      (acc, value) => {
        acc.push(value)
        return acc
      },
    )
  }

  public skipRepeat(n: number): ByteDecoder<undefined> {
    return new ByteDecoder((input) => {
      let rest = input

      for (let i = 0; i < n; i++) {
        const step = this.run(rest)
        if (step.kind !== "progress") return step

        rest = step.remaining
      }

      return progress(rest, undefined)
    })
  }

  /**
   * Exactly `n` repetitions folded into an accumulator. `init` is called once
   * per decode, so accumulators are never shared between calls.
   */
  public reduceRepeat<A>(n: number, init: () => A, f: (acc: A, value: T) => A): ByteDecoder<A> {
    return new ByteDecoder((input) => {
      let acc = init()
      let rest = input

      for (let i = 0; i < n; i++) {
        const step = this.run(rest)
        if (step.kind !== "progress") return step

        acc = f(acc, step.output)
        rest = step.remaining
      }

      return progress(rest, acc)
    })
  }

  /** Replace the output with the number of bytes consumed. */
  public countBytes(): ByteDecoder<number> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      return progress(step.remaining, consumed(input, step.remaining))
    })
  }

  /** Replace the output with the consumed bytes, as a view into the input. */
  public toSlice(): ByteDecoder<Uint8Array> {
    return this.parseSlice((slice) => slice)
  }

  public parseSlice<U>(f: (slice: Uint8Array) => U): ByteDecoder<U> {
    return new ByteDecoder((input) => {
      const step = this.run(input)
      if (step.kind !== "progress") return step

      return progress(step.remaining, f(input.subarray(0, consumed(input, step.remaining))))
    })
  }
}
