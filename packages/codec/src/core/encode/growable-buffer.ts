import { Buffer } from "node:buffer"

const textEncoder = new TextEncoder()

/**
 * Byte buffer written at the end. Capacity at least doubles when it has to
 * grow, and `reserve` lets a writer that knows its size grow exactly once up
 * front. `discard` drops consumed bytes from the front without shrinking.
 */
export class GrowableBuffer {
  private buf: Uint8Array
  private used = 0

  public constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(initialCapacity)
  }

  public get length(): number {
    return this.used
  }

  public get capacity(): number {
    return this.buf.byteLength
  }

  /** Make room for `additional` more bytes. */
  public reserve(additional: number): void {
    const needed = this.used + additional
    if (needed <= this.buf.byteLength) return

    const next = new Uint8Array(Math.max(needed, this.buf.byteLength * 2))
    next.set(this.buf.subarray(0, this.used))
    this.buf = next
  }

  public put(bytes: Uint8Array): void {
    this.reserve(bytes.byteLength)
    this.buf.set(bytes, this.used)
    this.used += bytes.byteLength
  }

  public putByte(byte: number): void {
    this.reserve(1)
    this.buf[this.used++] = byte
  }

  /** Write `text` one byte per char. Only for ASCII such as digits. */
  public putAscii(text: string): void {
    this.reserve(text.length)

    for (let i = 0; i < text.length; i++) {
      this.buf[this.used++] = text.charCodeAt(i)
    }
  }

  public putUtf8(text: string): void {
    this.reserve(Buffer.byteLength(text, "utf8"))

    const { written } = textEncoder.encodeInto(text, this.buf.subarray(this.used))
    this.used += written
  }

  /** The written bytes, as a view into the current storage. */
  public bytes(): Uint8Array {
    return this.buf.subarray(0, this.used)
  }

  /** Drop the first `count` written bytes, moving the rest to the front. */
  public discard(count: number): void {
    if (count <= 0) return

    const kept = Math.max(this.used - count, 0)
    this.buf.copyWithin(0, this.used - kept, this.used)
    this.used = kept
  }

  public clear(): void {
    this.used = 0
  }
}
