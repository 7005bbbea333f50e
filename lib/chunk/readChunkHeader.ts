import { TruncatedInputError } from "../errors"
import type { Logger } from "../logging/Logger"
import type { ByteCursor } from "./ByteCursor"
import { formatTag } from "./chunkTags"

export const CHUNK_HEADER_SIZE = 6

export interface ChunkHeader {
  tag: number
  /** Declared size, header included. */
  size: number
  /** Offset of the header itself. */
  start: number
  payloadStart: number
  /** Effective end of the payload after clamping to the enclosing region. */
  end: number
}

/**
 * Reads a tag + size header at the cursor and leaves the cursor at the start
 * of the payload. A declared end past the enclosing region is clamped to it;
 * a declared end past the buffer is fatal.
 */
export function readChunkHeader(
  cursor: ByteCursor,
  regionEnd: number,
  logger: Logger,
): ChunkHeader {
  const start = cursor.offset
  if (
    cursor.remaining(regionEnd) < CHUNK_HEADER_SIZE ||
    cursor.remaining() < CHUNK_HEADER_SIZE
  ) {
    throw new TruncatedInputError(
      `Truncated chunk header at offset ${start}.`,
      start,
    )
  }

  const tag = cursor.readUint16()
  const size = cursor.readUint32()
  const payloadStart = cursor.offset
  const declaredEnd = start + size

  if (declaredEnd > cursor.byteLength) {
    throw new TruncatedInputError(
      `Chunk ${formatTag(tag)} at offset ${start} declares ${size} bytes but only ${cursor.byteLength - start} remain.`,
      start,
    )
  }

  let end = declaredEnd
  if (size < CHUNK_HEADER_SIZE) {
    logger.warn(
      `Chunk ${formatTag(tag)} at offset ${start} declares ${size} bytes, less than its own header.`,
    )
    end = payloadStart
  } else if (declaredEnd > regionEnd) {
    logger.warn(
      `Chunk ${formatTag(tag)} at offset ${start} overflows its parent by ${declaredEnd - regionEnd} bytes; clamping.`,
    )
    end = regionEnd
  }

  return { tag, size, start, payloadStart, end }
}
