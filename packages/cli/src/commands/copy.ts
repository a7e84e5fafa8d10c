import type { CliConfig } from "../config.js";
import { createLogger, elapsedSeconds } from "../logger.js";
import { AccountError, copySavedVariables } from "../saved-variables.js";
import type { CommandContext } from "./context.js";

/**
 * Handle the copy command.
 *
 * @returns Exit code: 0 when a file was copied, 1 when nothing was, 2 when no account could be chosen
 */
export async function handleCopy(
	config: CliConfig,
	ctx: CommandContext,
): Promise<number> {
	const logger = createLogger("copy", {
		verbose: config.verbose,
		stdout: ctx.stdout,
		stderr: ctx.stderr,
		now: ctx.now,
	});
	const start = performance.now();

	let copied: string[];
	try {
		({ copied } = await copySavedVariables({
			accountRoot: config.accountRoot,
			account: config.account,
			dataDir: config.dataDir,
			includeBak: config.includeBak,
			logger,
			prompt: ctx.prompt,
			now: ctx.now,
		}));
	} catch (error) {
		if (error instanceof AccountError) {
			logger.warn(`ERROR: ${error.message}`);
			return 2;
		}
		throw error;
	}

	if (copied.length === 0) {
		logger.info("Nothing copied.");
		return 1;
	}

	logger.info(`Done in ${elapsedSeconds(start)}s`);
	return 0;
}
