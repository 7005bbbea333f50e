import { createSceneNode } from "./createSceneObjects"
import { ROOT_NODE_INDEX, type SceneNode } from "./types"

/**
 * Rebuilds the node tree from the flat, file-ordered sequence of node-name
 * records in the keyframe section. The file stores only a depth per record,
 * so placement depends on the most recently attached node and on a running
 * "last index" that is compared against positions but is not a tree depth.
 *
 * Note the ancestor walk attaches to the matching ancestor's parent, not to
 * the ancestor itself.
 */
export class NodeHierarchyBuilder {
  readonly nodes: SceneNode[]
  private currentIndex = ROOT_NODE_INDEX
  private lastNodeIndex = -1

  /** `nodes` must already hold the root at `ROOT_NODE_INDEX`. */
  constructor(nodes: SceneNode[]) {
    if (nodes.length === 0) throw new Error("Node arena is missing its root.")
    this.nodes = nodes
  }

  /** The node that pivot and track chunks currently apply to. */
  get current(): SceneNode {
    return this.node(this.currentIndex)
  }

  get currentNodeIndex() {
    return this.currentIndex
  }

  /**
   * Appends a node for a record carrying the raw 16-bit depth `rawDepth`.
   * The all-ones "no parent" depth wraps to position 0.
   */
  addNode(name: string, rawDepth: number): number {
    const position = (rawDepth + 1) & 0xffff
    const index = this.nodes.length
    this.nodes.push(createSceneNode(name, position, this.lastNodeIndex))

    const current = this.current
    if (current.hierarchyPosition === position) {
      // same depth as the last node: becomes its sibling
      this.attach(index, current.parent ?? this.currentIndex)
      this.lastNodeIndex++
    } else if (position >= this.lastNodeIndex) {
      this.attach(index, this.currentIndex)
      this.lastNodeIndex = position
    } else {
      this.attach(index, this.findAncestorParent(position))
      this.lastNodeIndex++
    }

    this.currentIndex = index
    return index
  }

  private findAncestorParent(position: number): number {
    let index: number | null = this.currentIndex
    while (index !== null) {
      const ancestor = this.node(index)
      if (ancestor.hierarchyPosition === position) {
        return ancestor.parent ?? index
      }
      index = ancestor.parent
    }
    return ROOT_NODE_INDEX
  }

  private attach(childIndex: number, parentIndex: number) {
    this.node(childIndex).parent = parentIndex
    this.node(parentIndex).children.push(childIndex)
  }

  private node(index: number): SceneNode {
    const node = this.nodes[index]
    if (!node) throw new Error(`Node index ${index} is out of range.`)
    return node
  }
}
