export type ParsedArgs = {
  _: string[]
  [key: string]: string | boolean | string[]
}

/**
 * `--name value` pairs and positionals. Names in `booleanFlags` never take a
 * value, so `--json model.3ds` keeps the path positional.
 */
export function parseCliArgs(
  args: string[],
  booleanFlags: ReadonlySet<string> = new Set(),
): ParsedArgs {
  const out: ParsedArgs = { _: [] }
  for (let i = 0; i < args.length; i++) {
    const tok = args[i]
    if (tok === undefined) continue
    if (!tok.startsWith("--")) {
      out._.push(tok)
      continue
    }
    const key = tok.slice(2)
    const next = args[i + 1]
    if (!booleanFlags.has(key) && next !== undefined && !next.startsWith("--")) {
      out[key] = next
      i++
    } else {
      out[key] = true
    }
  }
  return out
}
