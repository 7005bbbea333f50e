/**
 * Base class of every fatal decode failure. `offset` is the byte position
 * at which decoding had to stop.
 */
export class Parse3DSError extends Error {
  readonly offset: number

  constructor(message: string, offset: number) {
    super(message)
    this.name = "Parse3DSError"
    this.offset = offset
  }
}

export class TruncatedInputError extends Parse3DSError {
  constructor(message: string, offset: number) {
    super(message, offset)
    this.name = "TruncatedInputError"
  }
}

export class CorruptChunkError extends Parse3DSError {
  constructor(message: string, offset: number) {
    super(message, offset)
    this.name = "CorruptChunkError"
  }
}
