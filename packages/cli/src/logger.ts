/**
 * Console logging for the auction-export CLI.
 *
 * Lines look like `2026-10-18 21:04:11 [convert] Wrote 3 rows to: out.csv`.
 * Progress goes to stdout; warnings and verbose detail go to stderr.
 */

export interface LogSink {
	write(chunk: string): unknown;
}

export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	/** Written only when verbose logging is on */
	debug(message: string): void;
	/** Logger for a sub-step, sharing sinks and verbosity */
	child(name: string): Logger;
}

export interface LoggerOptions {
	verbose?: boolean;
	stdout?: LogSink;
	stderr?: LogSink;
	now?: () => Date;
}

/**
 * Format a local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(d: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(
		d.getHours(),
	)}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
	const stdout = options.stdout ?? process.stdout;
	const stderr = options.stderr ?? process.stderr;
	const now = options.now ?? (() => new Date());
	const verbose = options.verbose ?? false;

	const line = (message: string) =>
		`${formatTimestamp(now())} [${name}] ${message}\n`;

	return {
		info(message) {
			stdout.write(line(message));
		},
		warn(message) {
			stderr.write(line(message));
		},
		debug(message) {
			if (verbose) stderr.write(line(message));
		},
		child(childName) {
			return createLogger(childName, { ...options, stdout, stderr, now });
		},
	};
}

/**
 * Seconds elapsed since a `performance.now()` reading, two decimals
 */
export function elapsedSeconds(startMs: number): string {
	return ((performance.now() - startMs) / 1000).toFixed(2);
}
