import { ChunkTag } from "../chunk/chunkTags"
import { walkChunks } from "../chunk/walkChunks"
import type { Texture } from "../scene/types"
import type { ParseContext } from "./ParseContext"
import { readAsciiz } from "./readAsciiz"
import { readFloatPayload, readUint16Payload } from "./readScalarPayload"

const TILING_MIRROR = 0x2
const TILING_DECAL = 0x1
const TILING_NO_WRAP = 0x10

export function applyTilingFlags(texture: Texture, flags: number) {
  if (flags & TILING_MIRROR) {
    texture.wrapMode = "mirror"
  } else if (flags & TILING_NO_WRAP && flags & TILING_DECAL) {
    texture.wrapMode = "clamp"
  }
}

/** Fills one texture slot from the sub-chunks of a texture-map chunk. */
export function parseTextureChunk(
  ctx: ParseContext,
  texture: Texture,
  end: number,
) {
  const { cursor, logger } = ctx

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.MAP_FILENAME: {
        const { value, truncated } = readAsciiz(cursor, chunk.end)
        if (truncated) logger.warn(`Texture map name "${value}" is not terminated; truncating.`)
        texture.mapName = value
        break
      }
      case ChunkTag.PERCENT_FLOAT: {
        const blend = readFloatPayload(cursor, chunk, logger)
        if (blend !== null) texture.blend = blend
        break
      }
      case ChunkTag.PERCENT_WORD: {
        const blend = readUint16Payload(cursor, chunk, logger)
        if (blend !== null) texture.blend = blend / 100
        break
      }
      case ChunkTag.MAP_U_SCALE: {
        const scale = readFloatPayload(cursor, chunk, logger)
        if (scale === null) break
        if (scale === 0) {
          logger.warn("Texture coordinate scaling in the u direction is zero. Assuming 1.0.")
        }
        texture.scaleU = scale === 0 ? 1 : scale
        break
      }
      case ChunkTag.MAP_V_SCALE: {
        const scale = readFloatPayload(cursor, chunk, logger)
        if (scale === null) break
        if (scale === 0) {
          logger.warn("Texture coordinate scaling in the v direction is zero. Assuming 1.0.")
        }
        texture.scaleV = scale === 0 ? 1 : scale
        break
      }
      case ChunkTag.MAP_U_OFFSET:
        texture.offsetU = readFloatPayload(cursor, chunk, logger) ?? texture.offsetU
        break
      case ChunkTag.MAP_V_OFFSET:
        texture.offsetV = readFloatPayload(cursor, chunk, logger) ?? texture.offsetV
        break
      case ChunkTag.MAP_ROTATION:
        texture.rotation = readFloatPayload(cursor, chunk, logger) ?? texture.rotation
        break
      case ChunkTag.MAP_TILING: {
        const flags = readUint16Payload(cursor, chunk, logger)
        if (flags !== null) applyTilingFlags(texture, flags)
        break
      }
    }
  })
}
