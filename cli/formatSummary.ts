import type { DocumentSummary, NodeSummary } from "../lib/scene/summarizeDocument"

function formatNode(node: NodeSummary, depth: number, lines: string[]) {
  lines.push(`${"  ".repeat(depth)}${node.name}`)
  for (const child of node.children) formatNode(child, depth + 1, lines)
}

export function formatSummary(summary: DocumentSummary): string {
  const [r, g, b] = summary.ambientColor
  const lines = [
    `master scale: ${summary.masterScale}`,
    `ambient: ${r.toFixed(3)} ${g.toFixed(3)} ${b.toFixed(3)}`,
  ]
  if (summary.backgroundImage) lines.push(`background: ${summary.backgroundImage}`)

  lines.push(`meshes (${summary.meshes.length}):`)
  for (const mesh of summary.meshes) {
    lines.push(
      `  ${mesh.name}: ${mesh.vertices} vertices, ${mesh.uvs} uvs, ${mesh.faces} faces, ${mesh.unassignedFaces} without material`,
    )
  }

  lines.push(`materials (${summary.materials.length}):`)
  for (const material of summary.materials) {
    const maps = Object.entries(material.maps).map(([slot, file]) => `${slot}=${file}`)
    lines.push(`  ${material.name}${maps.length > 0 ? ` [${maps.join(", ")}]` : ""}`)
  }

  lines.push("nodes:")
  formatNode(summary.nodes, 1, lines)
  return lines.join("\n")
}
