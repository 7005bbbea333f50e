#!/usr/bin/env node
import { consoleLogger, createQuietLogger } from "../lib/logging/Logger";
import { summarizeDocument } from "../lib/scene/summarizeDocument";
import { formatSummary } from "./formatSummary";
import { isMainModule } from "./isMainModule";
import { parse3DSFile } from "./parse3DSFile";
import { parseCliArgs } from "./parseCliArgs";

const BOOLEAN_FLAGS = new Set(["json", "skipPivot", "noAnimation", "quiet"]);

export async function runCLI(args: string[] = process.argv.slice(2)) {
	const argv = parseCliArgs(args, BOOLEAN_FLAGS);
	const filePath = argv._[0];
	if (filePath === undefined) {
		console.error(
			"Usage: parse3ds model.3ds [--json] [--skipPivot] [--noAnimation] [--quiet]",
		);
		process.exit(1);
	}

	const document = await parse3DSFile(filePath, {
		logger: argv.quiet ? createQuietLogger() : consoleLogger,
		skipPivot: argv.skipPivot === true,
		readAnimationTracks: argv.noAnimation !== true,
	});
	const summary = summarizeDocument(document);
	console.log(
		argv.json ? JSON.stringify(summary, null, 2) : formatSummary(summary),
	);
}

if (isMainModule(import.meta)) {
	runCLI().catch((err) => {
		console.error(err);
		process.exit(1);
	});
}
