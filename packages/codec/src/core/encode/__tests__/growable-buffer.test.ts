import { ascii, latin1 } from "../../../tests/utils/bytes"
import { GrowableBuffer } from "../growable-buffer"

describe("GrowableBuffer", () => {
  it("starts empty with the requested capacity", () => {
    const buffer = new GrowableBuffer(8)

    expect(buffer.length).toBe(0)
    expect(buffer.capacity).toBe(8)
    expect(buffer.bytes()).toStrictEqual(new Uint8Array([]))
  })

  it("at least doubles when a write does not fit", () => {
    const buffer = new GrowableBuffer(4)

    buffer.put(ascii("abcde"))

    expect(buffer.capacity).toBe(8)
    expect(latin1(buffer.bytes())).toBe("abcde")
  })

  it("grows straight to a larger reservation", () => {
    const buffer = new GrowableBuffer(4)

    buffer.reserve(100)

    expect(buffer.capacity).toBe(100)
    expect(buffer.length).toBe(0)
  })

  it("does not grow when the reservation fits", () => {
    const buffer = new GrowableBuffer(4)
    buffer.putByte(1)

    buffer.reserve(3)

    expect(buffer.capacity).toBe(4)
  })

  it("writes ASCII and UTF-8 text", () => {
    const buffer = new GrowableBuffer(1)

    buffer.putAscii("12")
    buffer.putUtf8("é")

    expect(buffer.bytes()).toStrictEqual(new Uint8Array([0x31, 0x32, 0xc3, 0xa9]))
  })

  it("clear keeps the storage", () => {
    const buffer = new GrowableBuffer(4)
    buffer.put(ascii("abc"))

    buffer.clear()
    buffer.putByte(0x7a)

    expect(latin1(buffer.bytes())).toBe("z")
    expect(buffer.capacity).toBe(4)
  })

  it("discard moves the unconsumed tail to the front", () => {
    const buffer = new GrowableBuffer(8)
    buffer.put(ascii("abcdef"))

    buffer.discard(4)
    buffer.put(ascii("gh"))

    expect(latin1(buffer.bytes())).toBe("efgh")
    expect(buffer.capacity).toBe(8)
  })

  it("discard of everything or more empties the buffer", () => {
    const buffer = new GrowableBuffer(4)
    buffer.put(ascii("abc"))

    buffer.discard(10)

    expect(buffer.length).toBe(0)
    expect(buffer.capacity).toBe(4)
  })
})
