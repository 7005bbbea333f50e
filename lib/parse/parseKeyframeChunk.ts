import { ChunkTag } from "../chunk/chunkTags"
import type { ChunkHeader } from "../chunk/readChunkHeader"
import { walkChunks } from "../chunk/walkChunks"
import type { SceneNode } from "../scene/types"
import type { ParseContext } from "./ParseContext"
import { readAsciiz } from "./readAsciiz"
import {
  mergeTrackKeys,
  readRotationTrack,
  readVectorTrack,
  type TrackKey,
} from "./readKeyTrack"

export function parseKeyframeChunk(ctx: ParseContext, end: number) {
  walkChunks(ctx.cursor, end, ctx.logger, (chunk) => {
    if (chunk.tag === ChunkTag.OBJECT_NODE) parseObjectNodeChunk(ctx, chunk.end)
  })
}

function mergeKeys<T>(
  ctx: ParseContext,
  node: SceneNode,
  track: Array<TrackKey<T>>,
  keys: Array<TrackKey<T>>,
  what: string,
) {
  const dropped = mergeTrackKeys(track, keys)
  if (dropped > 0) {
    ctx.logger.warn(`Dropped ${dropped} duplicate ${what} keys of node "${node.name}".`)
  }
}

function readNodeName(ctx: ParseContext, chunk: ChunkHeader) {
  const { cursor, logger, hierarchy } = ctx
  const { value: name, truncated } = readAsciiz(cursor, chunk.end)
  if (truncated) {
    logger.warn(`Node name "${name}" is not terminated; ignoring the record.`)
    return
  }
  // two flag words precede the depth
  if (cursor.remaining(chunk.end) < 6) {
    logger.warn(`Node name record "${name}" has no hierarchy depth; ignoring it.`)
    return
  }
  cursor.skip(4)
  hierarchy.addNode(name, cursor.readUint16())
}

function parseObjectNodeChunk(ctx: ParseContext, end: number) {
  const { cursor, logger, hierarchy, options } = ctx

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.NODE_NAME:
        readNodeName(ctx, chunk)
        return
      case ChunkTag.PIVOT: {
        if (options.skipPivot) return
        if (cursor.remaining(chunk.end) < 12) {
          logger.warn(`Pivot of node "${hierarchy.current.name}" is truncated; ignoring it.`)
          return
        }
        const x = cursor.readFloat32()
        const y = cursor.readFloat32()
        const z = cursor.readFloat32()
        hierarchy.current.pivot = [x, z, y]
        return
      }
    }

    if (!options.readAnimationTracks) return
    const node = hierarchy.current

    switch (chunk.tag) {
      case ChunkTag.POSITION_TRACK: {
        const keys = readVectorTrack(cursor, chunk.end, logger, `Position track of node "${node.name}"`)
        mergeKeys(ctx, node, node.positionKeys, keys, "position")
        return
      }
      case ChunkTag.ROTATION_TRACK: {
        const keys = readRotationTrack(cursor, chunk.end, logger, `Rotation track of node "${node.name}"`)
        mergeKeys(ctx, node, node.rotationKeys, keys, "rotation")
        return
      }
      case ChunkTag.SCALING_TRACK: {
        const keys = readVectorTrack(cursor, chunk.end, logger, `Scaling track of node "${node.name}"`)
        mergeKeys(ctx, node, node.scalingKeys, keys, "scaling")
        const allZero =
          keys.length > 0 &&
          keys.every(({ value }) => value[0] === 0 && value[1] === 0 && value[2] === 0)
        if (allZero) {
          logger.warn(`All scaling keys of node "${node.name}" are zero. They will be removed.`)
          node.scalingKeys.length = 0
        }
        return
      }
    }
  })
}
