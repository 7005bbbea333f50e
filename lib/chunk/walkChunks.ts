import type { Logger } from "../logging/Logger"
import type { ByteCursor } from "./ByteCursor"
import { formatTag } from "./chunkTags"
import { type ChunkHeader, readChunkHeader } from "./readChunkHeader"

export type ChunkVisitor = (chunk: ChunkHeader) => void

/**
 * Visits every sibling chunk between the cursor and `regionEnd`. After each
 * visit the cursor is moved to the chunk's declared end, whatever the visitor
 * consumed, so unknown chunks are skipped and partial reads resynchronise.
 */
export function walkChunks(
  cursor: ByteCursor,
  regionEnd: number,
  logger: Logger,
  visit: ChunkVisitor,
) {
  while (cursor.offset < regionEnd) {
    const chunk = readChunkHeader(cursor, regionEnd, logger)
    visit(chunk)

    let end = chunk.end
    if (cursor.offset > end) {
      logger.warn(
        `Size of chunk ${formatTag(chunk.tag)} plus its subordinate chunks is larger than the size declared in its header.`,
      )
      end = cursor.offset
    }
    cursor.seek(end)
  }
}
