import { consoleLogger, type Logger } from "../logging/Logger"

/** Files shorter than this cannot hold a main chunk with any content. */
export const MINIMUM_FILE_SIZE = 16

export interface ParseOptions {
  logger: Logger
  /** Leave node pivots at the origin instead of reading pivot chunks. */
  skipPivot: boolean
  /** Read position, rotation and scaling keys of keyframe nodes. */
  readAnimationTracks: boolean
}

export type ParseOptionsInput = Partial<ParseOptions>

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({
  logger: consoleLogger,
  skipPivot: false,
  readAnimationTracks: true,
})

export function getDefaultParseOptions(): ParseOptions {
  return { ...DEFAULT_PARSE_OPTIONS }
}
