import { ByteCursor } from "../chunk/ByteCursor"
import type { Logger } from "../logging/Logger"
import type { ParseOptions } from "../options/getDefaultParseOptions"
import { createSceneDocument } from "../scene/createSceneObjects"
import { NodeHierarchyBuilder } from "../scene/NodeHierarchyBuilder"
import type { SceneDocument } from "../scene/types"

/** Everything a single decode call owns. Nothing here outlives the call. */
export interface ParseContext {
  cursor: ByteCursor
  logger: Logger
  options: ParseOptions
  document: SceneDocument
  hierarchy: NodeHierarchyBuilder
}

export function createParseContext(
  bytes: Uint8Array,
  options: ParseOptions,
): ParseContext {
  const document = createSceneDocument()
  return {
    cursor: new ByteCursor(bytes),
    logger: options.logger,
    options,
    document,
    hierarchy: new NodeHierarchyBuilder(document.nodes),
  }
}
