import type { ByteCursor } from "../chunk/ByteCursor"
import { formatTag } from "../chunk/chunkTags"
import type { ChunkHeader } from "../chunk/readChunkHeader"
import type { Logger } from "../logging/Logger"

function hasPayload(chunk: ChunkHeader, byteCount: number, logger: Logger) {
  if (chunk.end - chunk.payloadStart >= byteCount) return true
  logger.warn(
    `Chunk ${formatTag(chunk.tag)} at offset ${chunk.start} is too short to hold its value; ignoring it.`,
  )
  return false
}

export function readFloatPayload(
  cursor: ByteCursor,
  chunk: ChunkHeader,
  logger: Logger,
): number | null {
  return hasPayload(chunk, 4, logger) ? cursor.readFloat32() : null
}

export function readUint16Payload(
  cursor: ByteCursor,
  chunk: ChunkHeader,
  logger: Logger,
): number | null {
  return hasPayload(chunk, 2, logger) ? cursor.readUint16() : null
}

/**
 * Clamps a count-prefixed array to the records that fit before `end`,
 * warning when the declared count was larger.
 */
export function clampRecordCount(
  cursor: ByteCursor,
  end: number,
  declared: number,
  recordSize: number,
  what: string,
  logger: Logger,
) {
  const fits = Math.floor(cursor.remaining(end) / recordSize)
  if (declared <= fits) return declared
  logger.warn(
    `${what} declares ${declared} entries but only ${fits} fit in the chunk.`,
  )
  return fits
}
