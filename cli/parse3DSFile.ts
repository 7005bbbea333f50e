import * as fs from "node:fs"
import type { ParseOptionsInput } from "../lib/options/getDefaultParseOptions"
import { parse3DS } from "../lib/parse/parse3DS"
import type { SceneDocument } from "../lib/scene/types"

export async function parse3DSFile(
  filePath: string,
  options: ParseOptionsInput = {},
): Promise<SceneDocument> {
  const bytes = await fs.promises.readFile(filePath)
  return parse3DS(bytes, options)
}
