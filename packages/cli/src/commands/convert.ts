/**
 * convert command: saved-variables files to CSV.
 *
 * Converts the files named on the command line, or every export under the
 * data directory when none are given.
 */

import * as path from "node:path";
import type { CliConfig } from "../config.js";
import { convertBatch } from "../convert-file.js";
import { listExportFiles } from "../discovery.js";
import { createLogger, elapsedSeconds } from "../logger.js";
import type { CommandContext } from "./context.js";

/** Found inputs listed individually, up to this many */
const MAX_LISTED_INPUTS = 25;

/**
 * Handle the convert command.
 *
 * @returns Exit code: 0 when nothing failed, 2 for a misused --output or any failed file
 */
export async function handleConvert(
	config: CliConfig,
	ctx: CommandContext,
): Promise<number> {
	const logger = createLogger("convert", {
		verbose: config.verbose,
		stdout: ctx.stdout,
		stderr: ctx.stderr,
		now: ctx.now,
	});
	const start = performance.now();

	let inputs = config.inputs;
	if (inputs.length === 0) {
		logger.info(`Scanning for exports under: ${config.dataDir}`);
		inputs = await listExportFiles(config.dataDir);
	}

	if (inputs.length === 0) {
		logger.info("No .lua / .lua.bak files found.");
		return 0;
	}

	logger.info(`Found ${inputs.length} Lua export file(s).`);
	for (const input of inputs.slice(0, MAX_LISTED_INPUTS)) {
		logger.debug(`  - ${path.relative(ctx.cwd, input) || input}`);
	}
	if (inputs.length > MAX_LISTED_INPUTS) {
		logger.debug(`  ... and ${inputs.length - MAX_LISTED_INPUTS} more`);
	}

	if (config.output !== undefined && inputs.length !== 1) {
		logger.warn("ERROR: --output can only be used with a single input file.");
		return 2;
	}

	const summary = await convertBatch(inputs, logger, {
		output: config.output,
		baseDir: ctx.cwd,
		conversion: config.conversion,
		csv: config.csv,
	});

	logger.info(
		`Done. Converted: ${summary.converted}, skipped (already had CSV): ${summary.skipped}, failed: ${summary.failed}.`,
	);
	logger.info(`Total time: ${elapsedSeconds(start)}s`);

	if (summary.failed > 0) return 2;
	if (summary.converted === 0) logger.info("Nothing to do.");
	return 0;
}
