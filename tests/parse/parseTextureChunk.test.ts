import { expect, test } from "vitest"
import { ChunkTag } from "../../lib/chunk/chunkTags"
import { applyTilingFlags, parseTextureChunk } from "../../lib/parse/parseTextureChunk"
import { createTexture } from "../../lib/scene/createSceneObjects"
import { asciiz, chunk, concatBytes, createTestContext, f32, u16 } from "../fixtures/chunkBuilder"

test("reads every texture parameter", () => {
  const bytes = concatBytes(
    chunk(ChunkTag.MAP_FILENAME, asciiz("brick.tga")),
    chunk(ChunkTag.PERCENT_WORD, u16(50)),
    chunk(ChunkTag.MAP_U_SCALE, f32(2)),
    chunk(ChunkTag.MAP_V_SCALE, f32(4)),
    chunk(ChunkTag.MAP_U_OFFSET, f32(0.25)),
    chunk(ChunkTag.MAP_V_OFFSET, f32(-0.5)),
    chunk(ChunkTag.MAP_ROTATION, f32(1.5)),
    chunk(ChunkTag.MAP_TILING, u16(0x2)),
  )
  const { ctx, logger } = createTestContext(bytes)
  const texture = createTexture()

  parseTextureChunk(ctx, texture, bytes.byteLength)

  expect(texture).toEqual({
    mapName: "brick.tga",
    blend: 0.5,
    scaleU: 2,
    scaleV: 4,
    offsetU: 0.25,
    offsetV: -0.5,
    rotation: 1.5,
    wrapMode: "mirror",
  })
  expect(logger.warn).not.toHaveBeenCalled()
})

test("a float blend factor is used as stored", () => {
  const bytes = chunk(ChunkTag.PERCENT_FLOAT, f32(0.75))
  const { ctx } = createTestContext(bytes)
  const texture = createTexture()
  parseTextureChunk(ctx, texture, bytes.byteLength)
  expect(texture.blend).toBe(0.75)
})

test("a zero scale is replaced by one with a warning", () => {
  const bytes = concatBytes(chunk(ChunkTag.MAP_U_SCALE, f32(0)), chunk(ChunkTag.MAP_V_SCALE, f32(0)))
  const { ctx, logger } = createTestContext(bytes)
  const texture = createTexture()

  parseTextureChunk(ctx, texture, bytes.byteLength)

  expect(texture.scaleU).toBe(1)
  expect(texture.scaleV).toBe(1)
  expect(logger.warn).toHaveBeenCalledTimes(2)
  expect(logger.warn).toHaveBeenCalledWith(
    "Texture coordinate scaling in the u direction is zero. Assuming 1.0.",
  )
})

test("tiling flags pick mirror before clamp", () => {
  const wrapFor = (flags: number) => {
    const texture = createTexture()
    applyTilingFlags(texture, flags)
    return texture.wrapMode
  }
  expect(wrapFor(0x2)).toBe("mirror")
  expect(wrapFor(0x13)).toBe("mirror")
  expect(wrapFor(0x11)).toBe("clamp")
  expect(wrapFor(0x10)).toBe("wrap")
  expect(wrapFor(0x1)).toBe("wrap")
  expect(wrapFor(0)).toBe("wrap")
})
