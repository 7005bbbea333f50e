import { mat4, vec3 } from "gl-matrix"
import type { Mesh } from "../scene/types"

/**
 * Stores the 3x4 transform read from a mesh chunk. A transform with a
 * negative determinant describes a left-handed local frame; the vertices read
 * so far are then re-projected through inverse(M) * M' where M' is M with its
 * first column negated.
 */
export function applyLocalTransform(mesh: Mesh, transform: mat4): boolean {
  mesh.transform = transform
  if (mat4.determinant(transform) >= 0) return false

  const inverse = mat4.create()
  if (!mat4.invert(inverse, transform)) return false
  const mirrored = mat4.scale(mat4.create(), transform, [-1, 1, 1])
  const correction = mat4.multiply(mat4.create(), inverse, mirrored)

  for (const position of mesh.positions) {
    vec3.transformMat4(position, position, correction)
  }
  return true
}

/** Column-major matrix from the twelve floats of the file: three axes, then the origin. */
export function transformFromFloats(values: readonly number[]): mat4 {
  if (values.length !== 12) {
    throw new Error(`Expected 12 transform values, got ${values.length}.`)
  }
  const [ax, ay, az, bx, by, bz, cx, cy, cz, tx, ty, tz] = values
  return mat4.fromValues(
    ax, ay, az, 0,
    bx, by, bz, 0,
    cx, cy, cz, 0,
    tx, ty, tz, 1,
  )
}
