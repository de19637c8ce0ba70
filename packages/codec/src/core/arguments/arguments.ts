/**
 * An ordered list specialised for the arities requests nearly always have.
 *
 * Up to three items live in plain fields; a backing array only appears with
 * the fourth, at which point the list stays `more` for good.
 */
export type Arguments<T> =
  | { readonly kind: "none" }
  | { readonly kind: "one"; readonly a: T }
  | { readonly kind: "two"; readonly a: T; readonly b: T }
  | { readonly kind: "three"; readonly a: T; readonly b: T; readonly c: T }
  | { readonly kind: "more"; readonly items: T[] }

export type ArgumentsKind = Arguments<unknown>["kind"]

export const NO_ARGS: Arguments<never> = Object.freeze({ kind: "none" })

/**
 * Add `item` at the end.
 *
 * Takes ownership of `args`: a `more` list grows in place, so the value
 * passed in must not be used afterwards.
 */
export function append<T>(args: Arguments<T>, item: T): Arguments<T> {
  switch (args.kind) {
    case "none":
      return { kind: "one", a: item }
    case "one":
      return { kind: "two", a: args.a, b: item }
    case "two":
      return { kind: "three", a: args.a, b: args.b, c: item }
    case "three":
      return { kind: "more", items: [args.a, args.b, args.c, item] }
    case "more":
      args.items.push(item)
      return args
  }
}

export function nArgs(args: Arguments<unknown>): number {
  switch (args.kind) {
    case "none":
      return 0
    case "one":
      return 1
    case "two":
      return 2
    case "three":
      return 3
    case "more":
      return args.items.length
  }
}

export function first<T>(args: Arguments<T>): T | undefined {
  switch (args.kind) {
    case "none":
      return undefined
    case "more":
      return args.items[0]
    default:
      return args.a
  }
}

export function argumentAt<T>(args: Arguments<T>, index: number): T | undefined {
  switch (args.kind) {
    case "none":
      return undefined
    case "one":
      return index === 0 ? args.a : undefined
    case "two":
      if (index === 0) return args.a
      return index === 1 ? args.b : undefined
    case "three":
      if (index === 0) return args.a
      if (index === 1) return args.b
      return index === 2 ? args.c : undefined
    case "more":
      return args.items[index]
  }
}

export function* iterateArguments<T>(args: Arguments<T>): Generator<T, void, undefined> {
  switch (args.kind) {
    case "none":
      return
    case "one":
      yield args.a
      return
    case "two":
      yield args.a
      yield args.b
      return
    case "three":
      yield args.a
      yield args.b
      yield args.c
      return
    case "more":
      yield* args.items
  }
}

/**
 * Same arity, items transformed in order.
 */
export function mapArguments<T, U>(args: Arguments<T>, f: (item: T, index: number) => U): Arguments<U> {
  switch (args.kind) {
    case "none":
      return NO_ARGS
    case "one":
      return { kind: "one", a: f(args.a, 0) }
    case "two": {
      const a = f(args.a, 0)
      return { kind: "two", a, b: f(args.b, 1) }
    }
    case "three": {
      const a = f(args.a, 0)
      const b = f(args.b, 1)
      return { kind: "three", a, b, c: f(args.c, 2) }
    }
    case "more":
      return { kind: "more", items: args.items.map(f) }
  }
}

export function argumentsFrom<T>(items: Iterable<T>): Arguments<T> {
  let args: Arguments<T> = NO_ARGS

  for (const item of items) {
    args = append(args, item)
  }

  return args
}

export function argumentsToArray<T>(args: Arguments<T>): T[] {
  return [...iterateArguments(args)]
}
