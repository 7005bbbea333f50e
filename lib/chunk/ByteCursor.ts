import { CorruptChunkError } from "../errors"

/**
 * Read position over an immutable little-endian byte buffer. Every read is
 * bounds-checked against the end of the buffer; nothing ever writes to it.
 */
export class ByteCursor {
  readonly bytes: Uint8Array
  private readonly view: DataView
  private position: number

  constructor(input: ArrayBuffer | Uint8Array, offset = 0) {
    this.bytes = input instanceof Uint8Array ? input : new Uint8Array(input)
    this.view = new DataView(
      this.bytes.buffer,
      this.bytes.byteOffset,
      this.bytes.byteLength,
    )
    this.position = 0
    this.seek(offset)
  }

  get offset() {
    return this.position
  }

  get byteLength() {
    return this.bytes.byteLength
  }

  /** Bytes left between the cursor and `end` (the buffer end by default). */
  remaining(end = this.byteLength) {
    return Math.max(0, Math.min(end, this.byteLength) - this.position)
  }

  seek(offset: number) {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.byteLength) {
      throw new CorruptChunkError(
        `Cannot seek to offset ${offset} in a ${this.byteLength}-byte buffer.`,
        this.position,
      )
    }
    this.position = offset
  }

  skip(byteCount: number) {
    this.seek(this.position + byteCount)
  }

  readUint8() {
    this.require(1)
    const value = this.view.getUint8(this.position)
    this.position += 1
    return value
  }

  readUint16() {
    this.require(2)
    const value = this.view.getUint16(this.position, true)
    this.position += 2
    return value
  }

  readUint32() {
    this.require(4)
    const value = this.view.getUint32(this.position, true)
    this.position += 4
    return value
  }

  readFloat32() {
    this.require(4)
    const value = this.view.getFloat32(this.position, true)
    this.position += 4
    return value
  }

  /** Returns a view onto the buffer; the bytes are not copied. */
  readBytes(byteCount: number): Uint8Array {
    this.require(byteCount)
    const out = this.bytes.subarray(this.position, this.position + byteCount)
    this.position += byteCount
    return out
  }

  private require(byteCount: number) {
    if (this.position + byteCount > this.byteLength) {
      throw new CorruptChunkError(
        `Read of ${byteCount} bytes at offset ${this.position} runs past the end of the buffer.`,
        this.position,
      )
    }
  }
}
