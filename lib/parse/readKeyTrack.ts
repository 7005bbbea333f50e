import { quat, vec3 } from "gl-matrix"
import type { ByteCursor } from "../chunk/ByteCursor"
import type { Logger } from "../logging/Logger"
import type { Quat, Vec3 } from "../scene/types"
import { clampRecordCount } from "./readScalarPayload"

// flags word, eight unused bytes, key count, unused word
const TRACK_HEADER_SIZE = 14
// frame number and spline flags
const KEY_HEADER_SIZE = 6

export interface TrackKey<T> {
  time: number
  value: T
}

function readTrack<T>(
  cursor: ByteCursor,
  end: number,
  logger: Logger,
  what: string,
  valueSize: number,
  readValue: () => T,
): Array<TrackKey<T>> {
  if (cursor.remaining(end) < TRACK_HEADER_SIZE) {
    logger.warn(`${what} is too short to hold a track header.`)
    return []
  }
  cursor.skip(10)
  const declared = cursor.readUint16()
  cursor.skip(2)

  const count = clampRecordCount(
    cursor,
    end,
    declared,
    KEY_HEADER_SIZE + valueSize,
    what,
    logger,
  )
  const keys: Array<TrackKey<T>> = []
  for (let i = 0; i < count; i++) {
    const time = cursor.readUint16()
    cursor.skip(4)
    keys.push({ time, value: readValue() })
  }
  return keys
}

export function readVectorTrack(
  cursor: ByteCursor,
  end: number,
  logger: Logger,
  what: string,
): Array<TrackKey<Vec3>> {
  return readTrack(cursor, end, logger, what, 12, (): Vec3 => [
    cursor.readFloat32(),
    cursor.readFloat32(),
    cursor.readFloat32(),
  ])
}

/** Rotation keys are stored as an angle in radians followed by an axis. */
export function readRotationTrack(
  cursor: ByteCursor,
  end: number,
  logger: Logger,
  what: string,
): Array<TrackKey<Quat>> {
  return readTrack(cursor, end, logger, what, 16, (): Quat => {
    const angle = cursor.readFloat32()
    const axis: Vec3 = [cursor.readFloat32(), cursor.readFloat32(), cursor.readFloat32()]
    vec3.normalize(axis, axis)
    const rotation: Quat = [0, 0, 0, 1]
    quat.setAxisAngle(rotation, axis, angle)
    return rotation
  })
}

/**
 * Appends keys whose frame time is not already present in `track`. Returns
 * the number of keys dropped as duplicates.
 */
export function mergeTrackKeys<T>(
  track: Array<TrackKey<T>>,
  keys: Array<TrackKey<T>>,
): number {
  let dropped = 0
  for (const key of keys) {
    if (track.some((existing) => existing.time === key.time)) {
      dropped++
      continue
    }
    track.push(key)
  }
  return dropped
}
