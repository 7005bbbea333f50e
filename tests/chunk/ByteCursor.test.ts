import { expect, test } from "vitest"
import { ByteCursor } from "../../lib/chunk/ByteCursor"
import { CorruptChunkError } from "../../lib/errors"
import { concatBytes, f32, u16, u32, u8 } from "../fixtures/chunkBuilder"

test("reads little-endian integers and floats in order", () => {
  const cursor = new ByteCursor(concatBytes(u16(0x1234), u32(0x12345678), f32(1.5), u8(7)))
  expect(cursor.readUint16()).toBe(0x1234)
  expect(cursor.readUint32()).toBe(0x12345678)
  expect(cursor.readFloat32()).toBe(1.5)
  expect(cursor.readUint8()).toBe(7)
  expect(cursor.offset).toBe(11)
  expect(cursor.remaining()).toBe(0)
})

test("honours the byte offset of a view into a larger buffer", () => {
  const backing = u8(9, 9, 1, 0)
  const cursor = new ByteCursor(backing.subarray(2))
  expect(cursor.byteLength).toBe(2)
  expect(cursor.readUint16()).toBe(1)
})

test("accepts an ArrayBuffer", () => {
  const cursor = new ByteCursor(u16(42).buffer)
  expect(cursor.readUint16()).toBe(42)
})

test("throws instead of reading past the end of the buffer", () => {
  const cursor = new ByteCursor(u8(1, 2, 3))
  cursor.readUint16()
  expect(() => cursor.readUint16()).toThrow(CorruptChunkError)
  expect(cursor.offset).toBe(2)
})

test("rejects seeks outside the buffer", () => {
  const cursor = new ByteCursor(u8(1, 2, 3))
  cursor.seek(3)
  expect(cursor.offset).toBe(3)
  expect(() => cursor.seek(4)).toThrow(CorruptChunkError)
  expect(() => cursor.seek(-1)).toThrow(CorruptChunkError)
})

test("remaining is measured against the given end", () => {
  const cursor = new ByteCursor(new Uint8Array(10), 4)
  expect(cursor.remaining(6)).toBe(2)
  expect(cursor.remaining(2)).toBe(0)
  expect(cursor.remaining(50)).toBe(6)
})

test("readBytes returns a view without copying", () => {
  const bytes = u8(1, 2, 3, 4)
  const cursor = new ByteCursor(bytes, 1)
  const slice = cursor.readBytes(2)
  expect(Array.from(slice)).toEqual([2, 3])
  expect(slice.buffer).toBe(bytes.buffer)
  expect(cursor.offset).toBe(3)
})
