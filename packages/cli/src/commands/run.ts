import type { CliConfig } from "../config.js";
import { createLogger, elapsedSeconds } from "../logger.js";
import type { CommandContext } from "./context.js";
import { handleConvert } from "./convert.js";
import { handleCopy } from "./copy.js";

/**
 * Handle the run command: copy, then convert everything in the data directory.
 *
 * @returns The copy exit code when copying failed, otherwise the convert exit code
 */
export async function handleRun(
	config: CliConfig,
	ctx: CommandContext,
): Promise<number> {
	const logger = createLogger("run", {
		verbose: config.verbose,
		stdout: ctx.stdout,
		stderr: ctx.stderr,
		now: ctx.now,
	});
	const start = performance.now();

	logger.info("Step 1/2: Copy SavedVariables into the data directory");
	let stepStart = performance.now();
	const copyCode = await handleCopy(config, ctx);
	logger.info(`Step 1/2 finished in ${elapsedSeconds(stepStart)}s`);
	if (copyCode !== 0) {
		logger.warn(`Copy step failed with exit code ${copyCode}`);
		return copyCode;
	}

	logger.info("Step 2/2: Convert exports in the data directory to CSV");
	stepStart = performance.now();
	const convertCode = await handleConvert(
		{ ...config, inputs: [], output: undefined },
		ctx,
	);
	logger.info(`Step 2/2 finished in ${elapsedSeconds(stepStart)}s`);
	logger.info(`Total pipeline time: ${elapsedSeconds(start)}s`);
	return convertCode;
}
