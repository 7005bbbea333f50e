export const ChunkTag = {
  MAIN: 0x4d4d,
  EDITOR: 0x3d3d,
  VERSION: 0x0002,
  MASTER_SCALE: 0x0100,
  BACKGROUND_BITMAP: 0x1100,
  USE_BACKGROUND_BITMAP: 0x1101,
  AMBIENT_LIGHT: 0x2100,

  RGB_FLOAT: 0x0010,
  RGB_BYTE: 0x0011,
  LINEAR_RGB_BYTE: 0x0012,
  LINEAR_RGB_FLOAT: 0x0013,
  PERCENT_WORD: 0x0030,
  PERCENT_FLOAT: 0x0031,

  OBJECT_BLOCK: 0x4000,
  TRIANGLE_MESH: 0x4100,
  VERTEX_LIST: 0x4110,
  FACE_LIST: 0x4120,
  FACE_MATERIAL: 0x4130,
  UV_LIST: 0x4140,
  SMOOTHING_GROUPS: 0x4150,
  LOCAL_TRANSFORM: 0x4160,

  MATERIAL: 0xafff,
  MAT_NAME: 0xa000,
  MAT_AMBIENT: 0xa010,
  MAT_DIFFUSE: 0xa020,
  MAT_SPECULAR: 0xa030,
  MAT_SHININESS: 0xa040,
  MAT_SHININESS_STRENGTH: 0xa041,
  MAT_TRANSPARENCY: 0xa050,
  MAT_SELF_ILLUM_COLOR: 0xa080,
  MAT_TWO_SIDED: 0xa081,
  MAT_SELF_ILLUM_PERCENT: 0xa084,
  MAT_SHADING: 0xa100,

  MAT_TEXTURE: 0xa200,
  MAT_SPECULAR_MAP: 0xa204,
  MAT_OPACITY_MAP: 0xa210,
  MAT_BUMP_MAP: 0xa230,
  MAT_SHININESS_MAP: 0xa33c,
  MAT_SELF_ILLUM_MAP: 0xa33d,

  MAP_FILENAME: 0xa300,
  MAP_TILING: 0xa351,
  MAP_U_SCALE: 0xa354,
  MAP_V_SCALE: 0xa356,
  MAP_U_OFFSET: 0xa358,
  MAP_V_OFFSET: 0xa35a,
  MAP_ROTATION: 0xa35c,

  KEYFRAMER: 0xb000,
  OBJECT_NODE: 0xb002,
  NODE_NAME: 0xb010,
  PIVOT: 0xb013,
  POSITION_TRACK: 0xb020,
  ROTATION_TRACK: 0xb021,
  SCALING_TRACK: 0xb022,
} as const

export type ChunkTagName = keyof typeof ChunkTag

export function formatTag(tag: number) {
  return `0x${tag.toString(16).toUpperCase().padStart(4, "0")}`
}
