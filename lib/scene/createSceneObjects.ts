import { mat4 } from "gl-matrix"
import {
  type Material,
  type Mesh,
  type SceneDocument,
  type SceneNode,
  ShadingMode,
  type Texture,
} from "./types"

export const ROOT_NODE_NAME = "<root>"

export function createTexture(): Texture {
  return {
    mapName: "",
    blend: null,
    scaleU: 1,
    scaleV: 1,
    offsetU: 0,
    offsetV: 0,
    rotation: 0,
    wrapMode: "wrap",
  }
}

/** Unnamed materials are called `UNNAMED_<index>` until a name chunk arrives. */
export function createMaterial(index: number): Material {
  return {
    name: `UNNAMED_${index}`,
    ambient: [0, 0, 0],
    diffuse: [0.6, 0.6, 0.6],
    specular: [0, 0, 0],
    emissive: [0, 0, 0],
    opacity: 1,
    specularExponent: 0,
    shininessStrength: 1,
    shading: ShadingMode.Gouraud,
    twoSided: false,
    textures: {
      diffuse: createTexture(),
      bump: createTexture(),
      opacity: createTexture(),
      shininess: createTexture(),
      specular: createTexture(),
      emissive: createTexture(),
    },
  }
}

export function createMesh(name: string): Mesh {
  return {
    name,
    transform: mat4.create(),
    positions: [],
    uvs: [],
    faces: [],
    faceMaterials: [],
  }
}

export function createSceneNode(
  name: string,
  hierarchyPosition: number,
  hierarchyIndex: number,
): SceneNode {
  return {
    name,
    hierarchyPosition,
    hierarchyIndex,
    pivot: [0, 0, 0],
    parent: null,
    children: [],
    positionKeys: [],
    rotationKeys: [],
    scalingKeys: [],
  }
}

export function createSceneDocument(): SceneDocument {
  return {
    meshes: [],
    materials: [],
    nodes: [createSceneNode(ROOT_NODE_NAME, -1, -1)],
    ambientColor: [0, 0, 0],
    backgroundImage: null,
    hasBackground: false,
    masterScale: 1,
  }
}
