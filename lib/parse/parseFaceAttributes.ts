import { ChunkTag } from "../chunk/chunkTags"
import { walkChunks } from "../chunk/walkChunks"
import type { Material, Mesh } from "../scene/types"
import type { ParseContext } from "./ParseContext"
import { readAsciiz } from "./readAsciiz"
import { clampRecordCount } from "./readScalarPayload"

// ASCII letters only; other characters compare exactly
function foldCase(name: string) {
  return name.replace(/[A-Z]/g, (c) => c.toLowerCase())
}

export function findMaterialIndex(materials: Material[], name: string) {
  const wanted = foldCase(name)
  const index = materials.findIndex((m) => foldCase(m.name) === wanted)
  return index === -1 ? null : index
}

/**
 * Parses the sub-chunks trailing a face list: smoothing groups and per-face
 * material assignments.
 */
export function parseFaceAttributes(ctx: ParseContext, mesh: Mesh, end: number) {
  const { cursor, logger, document } = ctx

  walkChunks(cursor, end, logger, (chunk) => {
    switch (chunk.tag) {
      case ChunkTag.SMOOTHING_GROUPS: {
        for (const face of mesh.faces) {
          if (cursor.remaining(chunk.end) < 4) {
            logger.warn(`Smoothing group list of mesh "${mesh.name}" is shorter than its face list.`)
            break
          }
          face.smoothingGroups = cursor.readUint32()
        }
        break
      }
      case ChunkTag.FACE_MATERIAL: {
        const { value: name, truncated } = readAsciiz(cursor, chunk.end)
        if (truncated) {
          logger.warn(`Material name "${name}" in face material list of mesh "${mesh.name}" is not terminated.`)
        }
        const materialIndex = findMaterialIndex(document.materials, name)
        if (materialIndex === null) {
          logger.warn(`Mesh "${mesh.name}" references unknown material "${name}".`)
        }
        if (cursor.remaining(chunk.end) < 2) {
          logger.warn(`Face material list of mesh "${mesh.name}" has no face count; ignoring it.`)
          break
        }

        const count = clampRecordCount(
          cursor,
          chunk.end,
          cursor.readUint16(),
          2,
          `Face material list of mesh "${mesh.name}"`,
          logger,
        )
        const slots = mesh.faceMaterials
        for (let i = 0; i < count; i++) {
          const faceIndex = cursor.readUint16()
          if (faceIndex < slots.length) {
            slots[faceIndex] = materialIndex
            continue
          }
          logger.error(`Invalid face index ${faceIndex} in face material list of mesh "${mesh.name}".`)
          // out-of-range entries land on the last face
          if (slots.length > 0) slots[slots.length - 1] = materialIndex
        }
        break
      }
    }
  })
}
