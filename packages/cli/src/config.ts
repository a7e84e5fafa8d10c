/**
 * Configuration for the auction-export CLI.
 *
 * Reads configuration from:
 * 1. CLI arguments (--data-dir, --account-root, --account, ...)
 * 2. Environment variables (AUCTION_EXPORT_DATA_DIR, AUCTION_EXPORT_ACCOUNT_ROOT,
 *    AUCTION_EXPORT_ACCOUNT, AUCTION_EXPORT_CONFIG)
 * 3. Settings file (auction-export.yaml in the working directory), optional
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ConvertOptions, CsvOptions } from "@auction-export/core";
import yaml from "js-yaml";
import { z } from "zod";
import { isNotFound } from "./discovery.js";
import { DEFAULT_ACCOUNT_ROOT } from "./saved-variables.js";

export const COMMANDS = ["convert", "copy", "run"] as const;
export type Command = (typeof COMMANDS)[number];

export const DEFAULT_SETTINGS_FILE = "auction-export.yaml";

export const USAGE =
	"Usage: auction-export [convert|copy|run] [--data-dir data] [--account-root PATH] [--account NAME] [--include-bak] [-o out.csv] [--config FILE] [--strict] [--verbose] [input1.lua ...]";

/**
 * Bad command line: reported with the usage line, exit code 2
 */
export class UsageError extends Error {
	override readonly name = "UsageError";
}

/**
 * Unreadable or invalid settings file, exit code 2
 */
export class ConfigError extends Error {
	override readonly name = "ConfigError";
}

const settingsSchema = z
	.object({
		dataDir: z.string().min(1),
		accountRoot: z.string().min(1),
		account: z.string().min(1),
		keyPath: z.array(z.string().min(1)).min(1),
		denylist: z.array(z.string()),
		preferredFields: z.array(z.string()),
		mode: z.enum(["lenient", "strict"]),
		delimiter: z.string().length(1),
	})
	.partial()
	.strict();

export type Settings = z.infer<typeof settingsSchema>;

export interface CliArgs {
	command: Command;
	inputs: string[];
	output: string | undefined;
	dataDir: string | undefined;
	accountRoot: string | undefined;
	account: string | undefined;
	configPath: string | undefined;
	includeBak: boolean;
	strict: boolean;
	verbose: boolean;
	help: boolean;
}

export interface CliConfig {
	command: Command;
	/** Absolute input paths named on the command line */
	inputs: string[];
	/** Absolute output path, single-input conversions only */
	output: string | undefined;
	dataDir: string;
	accountRoot: string;
	account: string | undefined;
	includeBak: boolean;
	verbose: boolean;
	conversion: ConvertOptions;
	csv: CsvOptions;
}

export interface ConfigSources {
	env?: Record<string, string | undefined>;
	cwd?: string;
}

const VALUE_FLAGS = {
	"--data-dir": "dataDir",
	"--account-root": "accountRoot",
	"--account": "account",
	"--config": "configPath",
	"--output": "output",
	"-o": "output",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
	return Object.hasOwn(VALUE_FLAGS, arg);
}

function isCommand(arg: string): arg is Command {
	return COMMANDS.some((command) => command === arg);
}

/**
 * Parse CLI arguments (without the node and script entries).
 *
 * Value flags accept both `--flag value` and `--flag=value`. The first
 * positional argument selects the command when it names one; `convert` is
 * the default and the only command taking input files.
 *
 * @throws UsageError for unknown flags, missing values or misplaced inputs
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
	const out: CliArgs = {
		command: "convert",
		inputs: [],
		output: undefined,
		dataDir: undefined,
		accountRoot: undefined,
		account: undefined,
		configPath: undefined,
		includeBak: false,
		strict: false,
		verbose: false,
		help: false,
	};
	let commandSeen = false;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;

		if (arg === "--verbose") {
			out.verbose = true;
		} else if (arg === "--include-bak") {
			out.includeBak = true;
		} else if (arg === "--strict") {
			out.strict = true;
		} else if (arg === "-h" || arg === "--help") {
			out.help = true;
		} else if (isValueFlag(arg)) {
			const value = argv[i + 1];
			if (value === undefined) throw new UsageError(`Missing value after ${arg}`);
			out[VALUE_FLAGS[arg]] = value;
			i++;
		} else if (arg.startsWith("--") && arg.includes("=")) {
			const flag = arg.slice(0, arg.indexOf("="));
			if (!isValueFlag(flag)) throw new UsageError(`Unknown argument: ${flag}`);
			out[VALUE_FLAGS[flag]] = arg.slice(flag.length + 1);
		} else if (arg.startsWith("-")) {
			throw new UsageError(`Unknown argument: ${arg}`);
		} else if (!commandSeen && out.inputs.length === 0 && isCommand(arg)) {
			out.command = arg;
			commandSeen = true;
		} else {
			out.inputs.push(arg);
		}
	}

	if (out.command !== "convert" && out.inputs.length > 0) {
		throw new UsageError(
			`Unexpected positional argument for ${out.command}: ${out.inputs[0]}`,
		);
	}
	return out;
}

/**
 * Read and validate a YAML settings file.
 *
 * @param filePath - Settings file path
 * @param required - Whether a missing file is an error
 * @returns Validated settings; empty when an optional file is absent
 * @throws ConfigError for unreadable, unparsable or invalid files
 */
export function readSettingsFile(filePath: string, required: boolean): Settings {
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, "utf8");
	} catch (err) {
		if (!required && isNotFound(err)) {
			return {};
		}
		throw new ConfigError(
			`Cannot read settings file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	let doc: unknown;
	try {
		doc = yaml.load(raw);
	} catch (err) {
		throw new ConfigError(
			`Invalid YAML in ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
	if (doc === undefined || doc === null) return {};

	const parsed = settingsSchema.safeParse(doc);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid settings in ${filePath}: ${details}`);
	}
	return parsed.data;
}

/**
 * Build core conversion options from settings and flags
 */
function conversionOptions(settings: Settings, strict: boolean): ConvertOptions {
	const options: ConvertOptions = {};
	if (settings.keyPath !== undefined) options.keyPath = settings.keyPath;
	if (settings.denylist !== undefined) options.denylist = settings.denylist;
	if (settings.preferredFields !== undefined) {
		options.preferredFields = settings.preferredFields;
	}
	if (strict) options.mode = "strict";
	else if (settings.mode !== undefined) options.mode = settings.mode;
	return options;
}

/**
 * Load CLI configuration from all sources.
 *
 * Priority: CLI args > env vars > settings file > defaults. Relative paths
 * resolve against the working directory.
 *
 * @param argv - Arguments after the script name
 * @param sources - Environment and working directory (default: process)
 */
export function loadConfig(
	argv: readonly string[],
	sources: ConfigSources = {},
): CliConfig & { help: boolean } {
	const env = sources.env ?? process.env;
	const cwd = sources.cwd ?? process.cwd();
	const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(cwd, p));

	const cli = parseCliArgs(argv);

	const explicitSettings = cli.configPath ?? env["AUCTION_EXPORT_CONFIG"];
	const settings =
		explicitSettings !== undefined
			? readSettingsFile(resolve(explicitSettings), true)
			: readSettingsFile(path.join(cwd, DEFAULT_SETTINGS_FILE), false);

	const dataDir =
		cli.dataDir ?? env["AUCTION_EXPORT_DATA_DIR"] ?? settings.dataDir ?? "data";
	const accountRoot =
		cli.accountRoot ?? env["AUCTION_EXPORT_ACCOUNT_ROOT"] ?? settings.accountRoot;
	const account =
		cli.account ?? env["AUCTION_EXPORT_ACCOUNT"] ?? settings.account;

	const csv: CsvOptions = {};
	if (settings.delimiter !== undefined) csv.delimiter = settings.delimiter;

	return {
		command: cli.command,
		inputs: cli.inputs.map(resolve),
		output: cli.output !== undefined ? resolve(cli.output) : undefined,
		dataDir: resolve(dataDir),
		// The default root is a Windows path; resolving it elsewhere would mangle it.
		accountRoot:
			accountRoot !== undefined ? resolve(accountRoot) : DEFAULT_ACCOUNT_ROOT,
		account,
		includeBak: cli.includeBak,
		verbose: cli.verbose,
		conversion: conversionOptions(settings, cli.strict),
		csv,
		help: cli.help,
	};
}
