/**
 * auction-export command line.
 *
 * Commands:
 * - convert [files...]: saved-variables exports to `<input>.rows.csv` (default)
 * - copy: copy the add-on's SavedVariables into the data directory
 * - run: copy, then convert the data directory
 */

import type { CommandContext } from "./commands/context.js";
import { handleConvert } from "./commands/convert.js";
import { handleCopy } from "./commands/copy.js";
import { handleRun } from "./commands/run.js";
import { ConfigError, loadConfig, USAGE, UsageError } from "./config.js";
import { createTerminalPrompt } from "./saved-variables.js";

export { type CliConfig, loadConfig, parseCliArgs, USAGE } from "./config.js";
export { convertBatch, convertFile, decodeText } from "./convert-file.js";
export { copySavedVariables } from "./saved-variables.js";

export interface MainDeps extends Partial<CommandContext> {
	env?: Record<string, string | undefined>;
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the script name
 * @param deps - Streams, environment, prompt and clock (default: process)
 * @returns Process exit code
 */
export async function main(
	argv: readonly string[],
	deps: MainDeps = {},
): Promise<number> {
	const cwd = deps.cwd ?? process.cwd();
	const ctx: CommandContext = {
		stdout: deps.stdout ?? process.stdout,
		stderr: deps.stderr ?? process.stderr,
		cwd,
		prompt: deps.prompt ?? createTerminalPrompt("copy"),
		now: deps.now ?? (() => new Date()),
	};

	let config: ReturnType<typeof loadConfig>;
	try {
		config = loadConfig(argv, { env: deps.env ?? process.env, cwd });
	} catch (error) {
		if (error instanceof UsageError) {
			ctx.stderr.write(`${USAGE}\nerror: ${error.message}\n`);
			return 2;
		}
		if (error instanceof ConfigError) {
			ctx.stderr.write(`error: ${error.message}\n`);
			return 2;
		}
		throw error;
	}

	if (config.help) {
		ctx.stdout.write(`${USAGE}\n`);
		return 0;
	}

	switch (config.command) {
		case "convert":
			return handleConvert(config, ctx);
		case "copy":
			return handleCopy(config, ctx);
		case "run":
			return handleRun(config, ctx);
	}
}
