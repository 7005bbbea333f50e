import { expect, test } from "vitest"
import { ByteCursor } from "../../lib/chunk/ByteCursor"
import { ChunkTag } from "../../lib/chunk/chunkTags"
import { readPercentageChunk } from "../../lib/parse/readPercentageChunk"
import { chunk, concatBytes, createTestLogger, f32, u16, u8 } from "../fixtures/chunkBuilder"

function read(bytes: Uint8Array) {
  const cursor = new ByteCursor(bytes)
  const value = readPercentageChunk(cursor, bytes.byteLength, createTestLogger())
  return { value, offset: cursor.offset }
}

test("a word percentage is divided by 65535", () => {
  const { value } = read(chunk(ChunkTag.PERCENT_WORD, u16(0x7fff)))
  expect(value).toBe(32767 / 65535)
  expect(value).toBeCloseTo(0.499992, 6)
})

test("a float percentage is returned as stored", () => {
  expect(read(chunk(ChunkTag.PERCENT_FLOAT, f32(0.25))).value).toBe(0.25)
})

test("another tag yields null and is skipped", () => {
  const bytes = concatBytes(chunk(ChunkTag.RGB_BYTE, u8(1, 2, 3)), chunk(ChunkTag.PERCENT_FLOAT, f32(0.5)))
  expect(read(bytes)).toEqual({ value: null, offset: 9 })
})

test("a payload too short for its type yields null", () => {
  expect(read(chunk(ChunkTag.PERCENT_FLOAT, u8(1, 2))).value).toBeNull()
})

test("an exhausted region yields null", () => {
  expect(read(new Uint8Array(0))).toEqual({ value: null, offset: 0 })
})
