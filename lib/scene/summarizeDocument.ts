import {
  type Color3,
  ROOT_NODE_INDEX,
  type SceneDocument,
  TEXTURE_SLOTS,
  type TextureSlot,
} from "./types"

export interface NodeSummary {
  name: string
  children: NodeSummary[]
}

export interface DocumentSummary {
  masterScale: number
  ambientColor: Color3
  backgroundImage: string | null
  meshes: Array<{
    name: string
    vertices: number
    uvs: number
    faces: number
    unassignedFaces: number
  }>
  materials: Array<{ name: string; maps: Partial<Record<TextureSlot, string>> }>
  nodes: NodeSummary
}

function summarizeNode(document: SceneDocument, index: number): NodeSummary {
  const node = document.nodes[index]
  if (!node) throw new Error(`Node index ${index} is out of range.`)
  return {
    name: node.name,
    children: node.children.map((child) => summarizeNode(document, child)),
  }
}

export function summarizeDocument(document: SceneDocument): DocumentSummary {
  return {
    masterScale: document.masterScale,
    ambientColor: document.ambientColor,
    backgroundImage: document.hasBackground ? document.backgroundImage : null,
    meshes: document.meshes.map((mesh) => ({
      name: mesh.name,
      vertices: mesh.positions.length,
      uvs: mesh.uvs.length,
      faces: mesh.faces.length,
      unassignedFaces: mesh.faceMaterials.filter((m) => m === null).length,
    })),
    materials: document.materials.map((material) => {
      const maps: Partial<Record<TextureSlot, string>> = {}
      for (const slot of TEXTURE_SLOTS) {
        const mapName = material.textures[slot].mapName
        if (mapName) maps[slot] = mapName
      }
      return { name: material.name, maps }
    }),
    nodes: summarizeNode(document, ROOT_NODE_INDEX),
  }
}
