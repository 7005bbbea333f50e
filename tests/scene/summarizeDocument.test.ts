import { expect, test } from "vitest"
import { NodeHierarchyBuilder } from "../../lib/scene/NodeHierarchyBuilder"
import {
  createMaterial,
  createMesh,
  createSceneDocument,
} from "../../lib/scene/createSceneObjects"
import { summarizeDocument } from "../../lib/scene/summarizeDocument"

function sampleDocument() {
  const document = createSceneDocument()
  const material = createMaterial(0)
  material.textures.diffuse.mapName = "wood.png"
  material.textures.bump.mapName = "wood_n.png"
  document.materials.push(material, createMaterial(1))

  const mesh = createMesh("Table")
  mesh.positions.push([0, 0, 0], [1, 0, 0], [0, 1, 0])
  mesh.faces.push(
    { indices: [0, 1, 2], smoothingGroups: 0 },
    { indices: [2, 1, 0], smoothingGroups: 0 },
  )
  mesh.faceMaterials.push(0, null)
  document.meshes.push(mesh)

  const hierarchy = new NodeHierarchyBuilder(document.nodes)
  hierarchy.addNode("Table", 0xffff)
  hierarchy.addNode("Leg", 0)
  document.backgroundImage = "sky.png"
  return document
}

test("counts mesh contents and lists non-empty maps", () => {
  const summary = summarizeDocument(sampleDocument())
  expect(summary.meshes).toEqual([
    { name: "Table", vertices: 3, uvs: 0, faces: 2, unassignedFaces: 1 },
  ])
  expect(summary.materials).toEqual([
    { name: "UNNAMED_0", maps: { diffuse: "wood.png", bump: "wood_n.png" } },
    { name: "UNNAMED_1", maps: {} },
  ])
})

test("nests nodes under the root", () => {
  const summary = summarizeDocument(sampleDocument())
  expect(summary.nodes).toEqual({
    name: "<root>",
    children: [{ name: "Table", children: [{ name: "Leg", children: [] }] }],
  })
})

test("shows the background image only when it is enabled", () => {
  const document = sampleDocument()
  expect(summarizeDocument(document).backgroundImage).toBeNull()
  document.hasBackground = true
  expect(summarizeDocument(document).backgroundImage).toBe("sky.png")
})
