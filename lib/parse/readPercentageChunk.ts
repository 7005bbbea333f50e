import type { ByteCursor } from "../chunk/ByteCursor"
import { ChunkTag } from "../chunk/chunkTags"
import { CHUNK_HEADER_SIZE, readChunkHeader } from "../chunk/readChunkHeader"
import type { Logger } from "../logging/Logger"

/**
 * Reads one percentage sub-chunk. Returns the float as stored, or a word
 * divided by 65535; `null` for any other tag or a payload that is too short.
 * The cursor always ends up past the sub-chunk.
 */
export function readPercentageChunk(
  cursor: ByteCursor,
  end: number,
  logger: Logger,
): number | null {
  if (cursor.remaining(end) < CHUNK_HEADER_SIZE) return null

  const chunk = readChunkHeader(cursor, end, logger)
  const payloadSize = chunk.end - chunk.payloadStart
  let value: number | null = null

  if (chunk.tag === ChunkTag.PERCENT_FLOAT && payloadSize >= 4) {
    value = cursor.readFloat32()
  } else if (chunk.tag === ChunkTag.PERCENT_WORD && payloadSize >= 2) {
    value = cursor.readUint16() / 0xffff
  }

  cursor.seek(chunk.end)
  return value
}
