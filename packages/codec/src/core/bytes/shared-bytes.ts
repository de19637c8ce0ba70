import { Buffer } from "node:buffer"

/**
 * The one backing allocation behind every view of a decoded frame.
 * Nothing outside this module can write to it.
 */
export class SharedArena {
  private readonly bytes: Uint8Array

  public constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  public get byteLength(): number {
    return this.bytes.byteLength
  }

  public view(start: number, end: number): Uint8Array {
    return this.bytes.subarray(start, end)
  }
}

/**
 * An immutable `[start, end)` window onto a `SharedArena`.
 *
 * Copying a view never copies bytes: `clone()` and `slice()` return new
 * windows onto the same arena.
 */
export class SharedBytes {
  public readonly arena: SharedArena
  public readonly start: number
  public readonly end: number

  public constructor(arena: SharedArena, start = 0, end = arena.byteLength) {
    if (start < 0 || end < start || end > arena.byteLength) {
      throw new RangeError(`Invalid view [${start}, ${end}) of a ${arena.byteLength}-byte arena`)
    }

    this.arena = arena
    this.start = start
    this.end = end
  }

  /**
   * Copy `bytes` into an arena of its own.
   */
  public static copyOf(bytes: Uint8Array | string): SharedBytes {
    const copy = typeof bytes === "string" ? new TextEncoder().encode(bytes) : bytes.slice()

    return new SharedBytes(new SharedArena(copy))
  }

  public get length(): number {
    return this.end - this.start
  }

  public at(index: number): number | undefined {
    if (index < 0 || index >= this.length) return undefined

    return this.view()[index]
  }

  /**
   * Zero-copy view of the bytes. It aliases the arena, so callers must not
   * write through it.
   */
  public view(): Uint8Array {
    return this.arena.view(this.start, this.end)
  }

  /** Sub-window relative to this one, clamped to its bounds. */
  public slice(start = 0, end = this.length): SharedBytes {
    const from = clamp(start, 0, this.length)
    const to = clamp(end, from, this.length)

    return new SharedBytes(this.arena, this.start + from, this.start + to)
  }

  public clone(): SharedBytes {
    return new SharedBytes(this.arena, this.start, this.end)
  }

  public equals(other: SharedBytes | Uint8Array): boolean {
    const theirs = other instanceof SharedBytes ? other.view() : other
    const ours = this.view()

    if (ours.length !== theirs.length) return false

    return ours.every((b, i) => b === theirs[i])
  }

  public sharesArenaWith(other: SharedBytes): boolean {
    return this.arena === other.arena
  }

  public toString(encoding: BufferEncoding = "utf8"): string {
    const bytes = this.view()

    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding)
  }
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max)
}
