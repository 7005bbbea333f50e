import { expect, test } from "vitest"
import {
  DEFAULT_PARSE_OPTIONS,
  getDefaultParseOptions,
} from "../../lib/options/getDefaultParseOptions"
import { resolveParseOptions } from "../../lib/options/resolveParseOptions"
import { consoleLogger } from "../../lib/logging/Logger"
import { createTestLogger } from "../fixtures/chunkBuilder"

test("defaults read tracks and pivots through the console logger", () => {
  expect(resolveParseOptions()).toEqual({
    logger: consoleLogger,
    skipPivot: false,
    readAnimationTracks: true,
  })
})

test("given values override the defaults", () => {
  const logger = createTestLogger()
  const options = resolveParseOptions({ logger, readAnimationTracks: false })
  expect(options.logger).toBe(logger)
  expect(options.skipPivot).toBe(false)
  expect(options.readAnimationTracks).toBe(false)
})

test("getDefaultParseOptions returns a mutable copy", () => {
  const options = getDefaultParseOptions()
  options.skipPivot = true
  expect(DEFAULT_PARSE_OPTIONS.skipPivot).toBe(false)
})
