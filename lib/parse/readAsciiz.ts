import type { ByteCursor } from "../chunk/ByteCursor"

const decoder = new TextDecoder("latin1")

export interface AsciizResult {
  value: string
  /** No terminator was found before `end`. */
  truncated: boolean
}

/**
 * Reads a zero-terminated string that may not extend past `end`. The cursor
 * is left after the terminator, or at `end` when the string was cut short.
 */
export function readAsciiz(cursor: ByteCursor, end: number): AsciizResult {
  const start = cursor.offset
  const limit = Math.min(end, cursor.byteLength)
  const bytes = cursor.bytes
  let stop = start
  while (stop < limit && bytes[stop] !== 0) stop++

  const value = decoder.decode(cursor.readBytes(stop - start))
  const truncated = stop >= limit
  if (!truncated) cursor.skip(1)
  return { value, truncated }
}
