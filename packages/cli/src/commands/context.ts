import type { LogSink } from "../logger.js";
import type { Prompt } from "../saved-variables.js";

/**
 * Process-facing dependencies of a command, replaceable in tests
 */
export interface CommandContext {
	stdout: LogSink;
	stderr: LogSink;
	/** Directory logged paths are shown relative to */
	cwd: string;
	prompt: Prompt;
	now: () => Date;
}
