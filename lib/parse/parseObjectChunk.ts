import { ChunkTag } from "../chunk/chunkTags"
import { walkChunks } from "../chunk/walkChunks"
import { createMaterial, createMesh } from "../scene/createSceneObjects"
import type { ParseContext } from "./ParseContext"
import { parseKeyframeChunk } from "./parseKeyframeChunk"
import { parseMaterialChunk } from "./parseMaterialChunk"
import { parseMeshChunk } from "./parseMeshChunk"
import { readAsciiz } from "./readAsciiz"
import { readColorChunk } from "./readColorChunk"
import { readFloatPayload } from "./readScalarPayload"

/** Handles the children of the editor (object-mesh) section. */
export function parseObjectChunk(ctx: ParseContext, end: number) {
  const { cursor, logger, document } = ctx

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.OBJECT_BLOCK: {
        const mesh = createMesh("")
        document.meshes.push(mesh)
        const { value: name, truncated } = readAsciiz(cursor, chunk.end)
        if (truncated) logger.warn(`Object name "${name}" is not terminated.`)
        mesh.name = name
        walkChunks(cursor, chunk.end, logger, (child) => {
          if (child.tag === ChunkTag.TRIANGLE_MESH) parseMeshChunk(ctx, mesh, child.end)
        })
        break
      }
      case ChunkTag.MATERIAL: {
        const material = createMaterial(document.materials.length)
        document.materials.push(material)
        parseMaterialChunk(ctx, material, chunk.end)
        break
      }
      case ChunkTag.AMBIENT_LIGHT: {
        const color = readColorChunk(cursor, chunk.end, logger, true)
        if (!color) logger.warn("Unable to read the ambient light color; using black.")
        document.ambientColor = color ?? [0, 0, 0]
        break
      }
      case ChunkTag.BACKGROUND_BITMAP: {
        const { value, truncated } = readAsciiz(cursor, chunk.end)
        if (truncated) logger.warn(`Background image name "${value}" is not terminated.`)
        document.backgroundImage = value
        break
      }
      case ChunkTag.USE_BACKGROUND_BITMAP:
        document.hasBackground = true
        break
      case ChunkTag.MASTER_SCALE:
        document.masterScale = readFloatPayload(cursor, chunk, logger) ?? document.masterScale
        break
      // some producers put the keyframer inside the editor section
      case ChunkTag.KEYFRAMER:
        parseKeyframeChunk(ctx, chunk.end)
        break
    }
  })
}
