export { parse3DS } from "./parse/parse3DS"

export { ByteCursor } from "./chunk/ByteCursor"
export { ChunkTag, formatTag } from "./chunk/chunkTags"
export type { ChunkTagName } from "./chunk/chunkTags"
export {
  CHUNK_HEADER_SIZE,
  readChunkHeader,
  type ChunkHeader,
} from "./chunk/readChunkHeader"
export { walkChunks, type ChunkVisitor } from "./chunk/walkChunks"

export { readAsciiz, type AsciizResult } from "./parse/readAsciiz"
export { readColorChunk } from "./parse/readColorChunk"
export { readPercentageChunk } from "./parse/readPercentageChunk"

export { CorruptChunkError, Parse3DSError, TruncatedInputError } from "./errors"
export { consoleLogger, createQuietLogger } from "./logging/Logger"
export type { Logger } from "./logging/Logger"

export {
  DEFAULT_PARSE_OPTIONS,
  MINIMUM_FILE_SIZE,
  getDefaultParseOptions,
} from "./options/getDefaultParseOptions"
export type {
  ParseOptions,
  ParseOptionsInput,
} from "./options/getDefaultParseOptions"
export { resolveParseOptions } from "./options/resolveParseOptions"

export { NodeHierarchyBuilder } from "./scene/NodeHierarchyBuilder"
export {
  createMaterial,
  createMesh,
  createSceneDocument,
  createSceneNode,
  createTexture,
} from "./scene/createSceneObjects"
export { summarizeDocument } from "./scene/summarizeDocument"
export type { DocumentSummary, NodeSummary } from "./scene/summarizeDocument"
export { ROOT_NODE_INDEX, ShadingMode, TEXTURE_SLOTS } from "./scene/types"
export type {
  Color3,
  Face,
  Material,
  Mesh,
  Quat,
  QuatKey,
  SceneDocument,
  SceneNode,
  Texture,
  TextureSlot,
  TextureWrapMode,
  Vec2,
  Vec3,
  VectorKey,
} from "./scene/types"
