import type { ByteCursor } from "../chunk/ByteCursor"
import { ChunkTag } from "../chunk/chunkTags"
import { CHUNK_HEADER_SIZE, readChunkHeader } from "../chunk/readChunkHeader"
import type { Logger } from "../logging/Logger"
import type { Color3 } from "../scene/types"

const INVERSE_GAMMA = 1 / 2.2

function decodeGamma(color: Color3): Color3 {
  return [
    Math.pow(color[0], INVERSE_GAMMA),
    Math.pow(color[1], INVERSE_GAMMA),
    Math.pow(color[2], INVERSE_GAMMA),
  ]
}

/**
 * Reads the first color sub-chunk before `end`, skipping sibling chunks with
 * unrelated tags. Percentage chunks count as grey levels only when
 * `acceptPercent` is set. Returns `null` when nothing usable is found.
 */
export function readColorChunk(
  cursor: ByteCursor,
  end: number,
  logger: Logger,
  acceptPercent = false,
): Color3 | null {
  while (cursor.remaining(end) >= CHUNK_HEADER_SIZE) {
    const chunk = readChunkHeader(cursor, end, logger)
    const payloadSize = chunk.end - chunk.payloadStart
    let color: Color3 | null = null
    let recognized = true

    switch (chunk.tag) {
      case ChunkTag.RGB_FLOAT:
      case ChunkTag.LINEAR_RGB_FLOAT:
        if (payloadSize >= 12) {
          color = [cursor.readFloat32(), cursor.readFloat32(), cursor.readFloat32()]
        }
        break
      case ChunkTag.RGB_BYTE:
      case ChunkTag.LINEAR_RGB_BYTE:
        if (payloadSize >= 3) {
          color = [
            cursor.readUint8() / 255,
            cursor.readUint8() / 255,
            cursor.readUint8() / 255,
          ]
        }
        break
      case ChunkTag.PERCENT_FLOAT:
        if (acceptPercent && payloadSize >= 4) {
          const level = cursor.readFloat32()
          color = [level, level, level]
        }
        break
      case ChunkTag.PERCENT_WORD:
        // only the low byte is used, as a 0..255 level
        if (acceptPercent && payloadSize >= 1) {
          const level = cursor.readUint8() / 255
          color = [level, level, level]
        }
        break
      default:
        recognized = false
    }

    cursor.seek(chunk.end)
    if (!recognized) continue
    if (color && isLinearColorTag(chunk.tag)) return decodeGamma(color)
    return color
  }
  return null
}

function isLinearColorTag(tag: number) {
  return tag === ChunkTag.LINEAR_RGB_FLOAT || tag === ChunkTag.LINEAR_RGB_BYTE
}
