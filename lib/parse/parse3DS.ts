import { ChunkTag } from "../chunk/chunkTags"
import { walkChunks } from "../chunk/walkChunks"
import { TruncatedInputError } from "../errors"
import {
  MINIMUM_FILE_SIZE,
  type ParseOptionsInput,
} from "../options/getDefaultParseOptions"
import { resolveParseOptions } from "../options/resolveParseOptions"
import type { SceneDocument } from "../scene/types"
import { createParseContext, type ParseContext } from "./ParseContext"
import { parseKeyframeChunk } from "./parseKeyframeChunk"
import { parseObjectChunk } from "./parseObjectChunk"
import { readUint16Payload } from "./readScalarPayload"

function parseMainChunk(ctx: ParseContext, end: number) {
  const { cursor, logger } = ctx

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.EDITOR:
        parseObjectChunk(ctx, chunk.end)
        break
      case ChunkTag.KEYFRAMER:
        parseKeyframeChunk(ctx, chunk.end)
        break
      case ChunkTag.VERSION: {
        const version = readUint16Payload(cursor, chunk, logger)
        if (version !== null) logger.info(`3DS file version: ${version}`)
        break
      }
    }
  })
}

/**
 * Decodes a complete 3DS file into a scene document. Truncation that
 * prevents reading a chunk throws; every other defect is logged and worked
 * around.
 */
export function parse3DS(
  input: ArrayBuffer | Uint8Array,
  optionsInput: ParseOptionsInput = {},
): SceneDocument {
  const options = resolveParseOptions(optionsInput)
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input)
  if (bytes.byteLength < MINIMUM_FILE_SIZE) {
    throw new TruncatedInputError(
      `3DS file is too small (${bytes.byteLength} bytes).`,
      0,
    )
  }

  const ctx = createParseContext(bytes, options)
  walkChunks(ctx.cursor, bytes.byteLength, ctx.logger, (chunk) => {
    if (chunk.tag === ChunkTag.MAIN) parseMainChunk(ctx, chunk.end)
  })
  return ctx.document
}
