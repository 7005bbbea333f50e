import { ChunkTag } from "../chunk/chunkTags"
import { walkChunks } from "../chunk/walkChunks"
import type { Mesh } from "../scene/types"
import { applyLocalTransform, transformFromFloats } from "./applyLocalTransform"
import type { ParseContext } from "./ParseContext"
import { parseFaceAttributes } from "./parseFaceAttributes"
import { clampRecordCount } from "./readScalarPayload"

const VERTEX_SIZE = 12
const UV_SIZE = 8
// three indices and a flags word
const FACE_SIZE = 8
const TRANSFORM_SIZE = 48

export function parseMeshChunk(ctx: ParseContext, mesh: Mesh, end: number) {
  const { cursor, logger } = ctx

  const readCount = (chunkEnd: number, recordSize: number, what: string) => {
    const label = `${what} of mesh "${mesh.name}"`
    if (cursor.remaining(chunkEnd) < 2) {
      logger.warn(`${label} has no entry count; ignoring it.`)
      return 0
    }
    return clampRecordCount(cursor, chunkEnd, cursor.readUint16(), recordSize, label, logger)
  }

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.VERTEX_LIST: {
        const count = readCount(chunk.end, VERTEX_SIZE, "Vertex list")
        for (let i = 0; i < count; i++) {
          const x = cursor.readFloat32()
          const y = cursor.readFloat32()
          const z = cursor.readFloat32()
          mesh.positions.push([x, z, y])
        }
        break
      }
      case ChunkTag.LOCAL_TRANSFORM: {
        if (cursor.remaining(chunk.end) < TRANSFORM_SIZE) {
          logger.warn(`Local transform of mesh "${mesh.name}" is truncated; ignoring it.`)
          break
        }
        const values = Array.from({ length: 12 }, () => cursor.readFloat32())
        if (applyLocalTransform(mesh, transformFromFloats(values))) {
          logger.info(`Mesh "${mesh.name}" has a mirrored local transform; flipped its vertices.`)
        }
        break
      }
      case ChunkTag.UV_LIST: {
        const count = readCount(chunk.end, UV_SIZE, "UV list")
        for (let i = 0; i < count; i++) {
          const u = cursor.readFloat32()
          const v = cursor.readFloat32()
          mesh.uvs.push([u, v])
        }
        break
      }
      case ChunkTag.FACE_LIST: {
        const count = readCount(chunk.end, FACE_SIZE, "Face list")
        for (let i = 0; i < count; i++) {
          const a = cursor.readUint16()
          const b = cursor.readUint16()
          const c = cursor.readUint16()
          cursor.readUint16()
          mesh.faces.push({ indices: [a, b, c], smoothingGroups: 0 })
        }
        while (mesh.faceMaterials.length < mesh.faces.length) {
          mesh.faceMaterials.push(null)
        }
        if (cursor.offset < chunk.end) parseFaceAttributes(ctx, mesh, chunk.end)
        break
      }
    }
  })
}
