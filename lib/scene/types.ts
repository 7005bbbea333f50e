import type { mat4 } from "gl-matrix"

export type Vec2 = [number, number]
export type Vec3 = [number, number, number]
export type Color3 = [number, number, number]
/** Unit quaternion, `[x, y, z, w]`. */
export type Quat = [number, number, number, number]

export interface Face {
  indices: [number, number, number]
  /** Bit n set means the face belongs to smoothing group n; 0 means hard edges. */
  smoothingGroups: number
}

export interface Mesh {
  name: string
  /** Local affine transform read from the file; identity when absent. */
  transform: mat4
  positions: Vec3[]
  /** Parallel to `positions` but may be shorter or empty. */
  uvs: Vec2[]
  faces: Face[]
  /** One entry per face; `null` until a face-material chunk names a known material. */
  faceMaterials: Array<number | null>
}

export type TextureWrapMode = "wrap" | "mirror" | "clamp"

export const TEXTURE_SLOTS = [
  "diffuse",
  "bump",
  "opacity",
  "shininess",
  "specular",
  "emissive",
] as const

export type TextureSlot = (typeof TEXTURE_SLOTS)[number]

export interface Texture {
  mapName: string
  blend: number | null
  scaleU: number
  scaleV: number
  offsetU: number
  offsetV: number
  /** Radians, as stored. */
  rotation: number
  wrapMode: TextureWrapMode
}

export const ShadingMode = {
  Wire: 0,
  Flat: 1,
  Gouraud: 2,
  Phong: 3,
  Metal: 4,
} as const

export interface Material {
  name: string
  ambient: Color3
  diffuse: Color3
  specular: Color3
  emissive: Color3
  /** 1 minus the transparency percentage; 1 is fully opaque. */
  opacity: number
  specularExponent: number
  shininessStrength: number
  /** Raw shading value, usually one of `ShadingMode`. */
  shading: number
  twoSided: boolean
  textures: Record<TextureSlot, Texture>
}

export interface VectorKey {
  time: number
  value: Vec3
}

export interface QuatKey {
  time: number
  value: Quat
}

export interface SceneNode {
  name: string
  hierarchyPosition: number
  hierarchyIndex: number
  pivot: Vec3
  /** Arena index of the parent, `null` for the root. */
  parent: number | null
  children: number[]
  positionKeys: VectorKey[]
  rotationKeys: QuatKey[]
  scalingKeys: VectorKey[]
}

export const ROOT_NODE_INDEX = 0

export interface SceneDocument {
  meshes: Mesh[]
  materials: Material[]
  /** Node arena; the root is always at `ROOT_NODE_INDEX`. */
  nodes: SceneNode[]
  ambientColor: Color3
  backgroundImage: string | null
  hasBackground: boolean
  masterScale: number
}
