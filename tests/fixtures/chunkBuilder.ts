import { vi } from "vitest"
import { ChunkTag } from "../../lib/chunk/chunkTags"
import type { Logger } from "../../lib/logging/Logger"
import type { ParseOptionsInput } from "../../lib/options/getDefaultParseOptions"
import { resolveParseOptions } from "../../lib/options/resolveParseOptions"
import { createParseContext } from "../../lib/parse/ParseContext"

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, p) => sum + p.byteLength, 0))
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.byteLength
  }
  return out
}

export function u8(...values: number[]) {
  return Uint8Array.from(values)
}

export function u16(...values: number[]) {
  const view = new DataView(new ArrayBuffer(values.length * 2))
  values.forEach((v, i) => view.setUint16(i * 2, v, true))
  return new Uint8Array(view.buffer)
}

export function u32(...values: number[]) {
  const view = new DataView(new ArrayBuffer(values.length * 4))
  values.forEach((v, i) => view.setUint32(i * 4, v, true))
  return new Uint8Array(view.buffer)
}

export function f32(...values: number[]) {
  const view = new DataView(new ArrayBuffer(values.length * 4))
  values.forEach((v, i) => view.setFloat32(i * 4, v, true))
  return new Uint8Array(view.buffer)
}

export function asciiz(text: string) {
  return concatBytes(new TextEncoder().encode(text), u8(0))
}

/** A chunk whose header declares `declaredSize` regardless of its payload. */
export function rawChunk(tag: number, declaredSize: number, ...payload: Uint8Array[]) {
  return concatBytes(u16(tag), u32(declaredSize), ...payload)
}

export function chunk(tag: number, ...payload: Uint8Array[]) {
  const body = concatBytes(...payload)
  return rawChunk(tag, body.byteLength + 6, body)
}

export function nodeName(name: string, rawDepth: number) {
  return chunk(ChunkTag.NODE_NAME, asciiz(name), u16(0, 0), u16(rawDepth))
}

export function trackKey(frame: number, value: Uint8Array) {
  return concatBytes(u16(frame), u32(0), value)
}

export function track(tag: number, ...keys: Uint8Array[]) {
  return chunk(tag, u16(0), new Uint8Array(8), u16(keys.length), u16(0), ...keys)
}

/** MAIN > (VERSION, EDITOR > children) */
export function build3DS(...editorChildren: Uint8Array[]) {
  return chunk(
    ChunkTag.MAIN,
    chunk(ChunkTag.VERSION, u32(3)),
    chunk(ChunkTag.EDITOR, ...editorChildren),
  )
}

export function createTestLogger() {
  return {
    info: vi.fn((_message: string) => {}),
    warn: vi.fn((_message: string) => {}),
    error: vi.fn((_message: string) => {}),
  } satisfies Logger
}

export function createTestContext(bytes: Uint8Array, options: ParseOptionsInput = {}) {
  const logger = createTestLogger()
  const ctx = createParseContext(bytes, resolveParseOptions({ logger, ...options }))
  return { ctx, logger }
}
