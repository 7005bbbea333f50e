import * as path from "node:path";
import { pathToFileURL } from "node:url";

export function isMainModule(meta: ImportMeta): boolean {
	const entry = process.argv[1];
	if (!entry) return false;
	return pathToFileURL(path.resolve(entry)).href === meta.url;
}
