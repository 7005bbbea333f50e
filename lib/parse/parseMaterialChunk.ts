import { ChunkTag } from "../chunk/chunkTags"
import type { ChunkHeader } from "../chunk/readChunkHeader"
import { walkChunks } from "../chunk/walkChunks"
import type { Color3, Material, TextureSlot } from "../scene/types"
import type { ParseContext } from "./ParseContext"
import { parseTextureChunk } from "./parseTextureChunk"
import { readAsciiz } from "./readAsciiz"
import { readColorChunk } from "./readColorChunk"
import { readPercentageChunk } from "./readPercentageChunk"
import { readUint16Payload } from "./readScalarPayload"

const TEXTURE_SLOT_BY_TAG: ReadonlyMap<number, TextureSlot> = new Map<
  number,
  TextureSlot
>([
  [ChunkTag.MAT_TEXTURE, "diffuse"],
  [ChunkTag.MAT_BUMP_MAP, "bump"],
  [ChunkTag.MAT_OPACITY_MAP, "opacity"],
  [ChunkTag.MAT_SHININESS_MAP, "shininess"],
  [ChunkTag.MAT_SPECULAR_MAP, "specular"],
  [ChunkTag.MAT_SELF_ILLUM_MAP, "emissive"],
])

const WHITE: Color3 = [1, 1, 1]
const BLACK: Color3 = [0, 0, 0]

export function parseMaterialChunk(
  ctx: ParseContext,
  material: Material,
  end: number,
) {
  const { cursor, logger } = ctx

  const colorOr = (chunk: ChunkHeader, label: string, fallback: Color3): Color3 => {
    const color = readColorChunk(cursor, chunk.end, logger)
    if (color) return color
    logger.error(`Unable to read ${label} chunk of material "${material.name}".`)
    return [...fallback]
  }

  const percentage = (chunk: ChunkHeader, label: string): number | null => {
    const value = readPercentageChunk(cursor, chunk.end, logger)
    if (value === null) {
      logger.warn(`Unable to read ${label} percentage of material "${material.name}".`)
    }
    return value
  }

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.MAT_NAME: {
        const { value, truncated } = readAsciiz(cursor, chunk.end)
        if (truncated) logger.error(`Material name string "${value}" is too long.`)
        material.name = value
        return
      }
      case ChunkTag.MAT_DIFFUSE:
        material.diffuse = colorOr(chunk, "DIFFUSE", WHITE)
        return
      case ChunkTag.MAT_SPECULAR:
        material.specular = colorOr(chunk, "SPECULAR", WHITE)
        return
      case ChunkTag.MAT_AMBIENT:
        material.ambient = colorOr(chunk, "AMBIENT", WHITE)
        return
      case ChunkTag.MAT_SELF_ILLUM_COLOR:
        material.emissive = colorOr(chunk, "EMISSIVE", BLACK)
        return
      case ChunkTag.MAT_TRANSPARENCY: {
        const value = percentage(chunk, "transparency")
        material.opacity = value === null ? 1 : 1 - value
        return
      }
      case ChunkTag.MAT_SHADING:
        material.shading = readUint16Payload(cursor, chunk, logger) ?? material.shading
        return
      case ChunkTag.MAT_TWO_SIDED:
        material.twoSided = true
        return
      case ChunkTag.MAT_SHININESS: {
        const value = percentage(chunk, "shininess")
        material.specularExponent = value === null ? 0 : value * 0xffff
        return
      }
      case ChunkTag.MAT_SHININESS_STRENGTH: {
        const value = percentage(chunk, "shininess strength")
        material.shininessStrength = value === null ? 0 : (value * 0xffff) / 100
        return
      }
      case ChunkTag.MAT_SELF_ILLUM_PERCENT: {
        const value = percentage(chunk, "self illumination")
        material.textures.emissive.blend = value === null ? 0 : (value * 0xffff) / 100
        return
      }
    }

    const slot = TEXTURE_SLOT_BY_TAG.get(chunk.tag)
    if (slot) parseTextureChunk(ctx, material.textures[slot], chunk.end)
  })
}
