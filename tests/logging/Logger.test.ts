import { expect, test } from "vitest"
import { createQuietLogger } from "../../lib/logging/Logger"
import { createTestLogger } from "../fixtures/chunkBuilder"

test("the quiet logger drops info and forwards the rest", () => {
  const inner = createTestLogger()
  const logger = createQuietLogger(inner)
  logger.info("version")
  logger.warn("clamped")
  logger.error("bad index")
  expect(inner.info).not.toHaveBeenCalled()
  expect(inner.warn).toHaveBeenCalledWith("clamped")
  expect(inner.error).toHaveBeenCalledWith("bad index")
})
