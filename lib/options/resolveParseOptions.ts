import {
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
  type ParseOptionsInput,
} from "./getDefaultParseOptions"

export function resolveParseOptions(
  options: ParseOptionsInput = {},
): ParseOptions {
  return {
    logger: options.logger ?? DEFAULT_PARSE_OPTIONS.logger,
    skipPivot: options.skipPivot ?? DEFAULT_PARSE_OPTIONS.skipPivot,
    readAnimationTracks:
      options.readAnimationTracks ?? DEFAULT_PARSE_OPTIONS.readAnimationTracks,
  }
}
