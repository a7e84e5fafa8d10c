/**
 * Copying the add-on's SavedVariables out of a game install into the data
 * directory, so conversions never touch the live files.
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createInterface } from "node:readline/promises";
import { isNotFound } from "./discovery.js";
import type { Logger } from "./logger.js";
import { formatTimestamp } from "./logger.js";

export const DEFAULT_ACCOUNT_ROOT =
	"C:\\Program Files (x86)\\World of Warcraft\\_retail_\\WTF\\Account";

export const EXPORT_FILE_NAME = "AuctionExport.lua";

/** Folders under the account root that are not accounts */
const NON_ACCOUNT_FOLDERS = new Set(["sharedvariables", "savedvariables"]);

/**
 * Account root or account selection problem, exit code 2
 */
export class AccountError extends Error {
	override readonly name = "AccountError";
}

export interface AccountFolder {
	name: string;
	path: string;
}

/** Asks the user one question and resolves with the raw answer */
export type Prompt = (question: string) => Promise<string>;

/**
 * List account folders under the account root, sorted case-insensitively.
 *
 * @throws AccountError when the root is missing or not a directory
 */
export async function listAccountFolders(
	accountRoot: string,
): Promise<AccountFolder[]> {
	let stat: Stats;
	try {
		stat = await fs.stat(accountRoot);
	} catch (err) {
		if (isNotFound(err)) {
			throw new AccountError(`Account root does not exist: ${accountRoot}`);
		}
		throw err;
	}
	if (!stat.isDirectory()) {
		throw new AccountError(`Account root is not a directory: ${accountRoot}`);
	}

	const entries = await fs.readdir(accountRoot, { withFileTypes: true });
	return entries
		.filter(
			(e) => e.isDirectory() && !NON_ACCOUNT_FOLDERS.has(e.name.toLowerCase()),
		)
		.map((e) => ({ name: e.name, path: path.join(accountRoot, e.name) }))
		.sort((a, b) => {
			const la = a.name.toLowerCase();
			const lb = b.name.toLowerCase();
			return la < lb ? -1 : la > lb ? 1 : 0;
		});
}

/**
 * Match a typed answer against the listed accounts.
 *
 * A number picks by 1-based position; anything else must equal a folder
 * name exactly.
 */
export function selectAccount(
	choices: readonly AccountFolder[],
	answer: string,
): AccountFolder | undefined {
	const raw = answer.trim();
	if (raw === "") return undefined;
	if (/^\d+$/.test(raw)) {
		const index = Number(raw);
		return index >= 1 ? choices[index - 1] : undefined;
	}
	return choices.find((c) => c.name === raw);
}

/**
 * Pick the account to copy from.
 *
 * A requested name must match exactly. Otherwise a single account is used
 * as is, and several are listed and asked for until a valid answer.
 */
export async function resolveAccount(
	accountRoot: string,
	requested: string | undefined,
	logger: Logger,
	prompt: Prompt,
): Promise<AccountFolder> {
	const choices = await listAccountFolders(accountRoot);

	if (requested !== undefined && requested !== "") {
		const match = choices.find((c) => c.name === requested);
		if (match) return match;
		const names = choices.map((c) => c.name).join(", ") || "<none>";
		throw new AccountError(
			`Account '${requested}' not found under ${accountRoot}. Found: ${names}`,
		);
	}

	const [only] = choices;
	if (only === undefined) throw new AccountError("No account folders found");
	if (choices.length === 1) return only;

	logger.info("Multiple account folders found. Select one:");
	choices.forEach((c, i) => logger.info(`  ${i + 1}) ${c.name}`));

	for (;;) {
		const answer = await prompt("Enter number (or exact folder name): ");
		const picked = selectAccount(choices, answer);
		if (picked) return picked;
		if (answer.trim() === "") continue;
		logger.warn(
			/^\d+$/.test(answer.trim())
				? `Invalid selection: ${answer.trim()}`
				: `Unknown folder name: ${answer.trim()}`,
		);
	}
}

/**
 * Prompt on the terminal, prefixing the question like a log line
 */
export function createTerminalPrompt(name: string): Prompt {
	return async (question) => {
		const rl = createInterface({ input: process.stdin, output: process.stdout });
		try {
			return await rl.question(
				`${formatTimestamp(new Date())} [${name}] ${question}`,
			);
		} finally {
			rl.close();
		}
	};
}

/**
 * Timestamp used in copied file names, `YYYYMMDDHHMMSS` local time
 */
export function formatCopyTimestamp(d: Date): string {
	return formatTimestamp(d).replace(/[-: ]/g, "");
}

export interface CopyOptions {
	accountRoot: string;
	account: string | undefined;
	dataDir: string;
	includeBak: boolean;
	logger: Logger;
	prompt: Prompt;
	now?: () => Date;
}

export interface CopyResult {
	account: string;
	/** Destination paths, in copy order */
	copied: string[];
}

async function copyIfExists(src: string, dest: string): Promise<boolean> {
	try {
		const stat = await fs.stat(src);
		if (!stat.isFile()) return false;
	} catch (err) {
		if (isNotFound(err)) return false;
		throw err;
	}
	await fs.mkdir(path.dirname(dest), { recursive: true });
	await fs.copyFile(src, dest);
	return true;
}

/**
 * Copy `AuctionExport.lua` (and optionally its `.bak`) from the chosen
 * account into the data directory as `AuctionExport-<timestamp>.lua[.bak]`.
 *
 * @throws AccountError when no account can be chosen
 */
export async function copySavedVariables(
	options: CopyOptions,
): Promise<CopyResult> {
	const { logger } = options;
	const account = await resolveAccount(
		options.accountRoot,
		options.account,
		logger,
		options.prompt,
	);

	const sourceDir = path.join(account.path, "SavedVariables");
	const now = options.now ?? (() => new Date());
	const baseName = `AuctionExport-${formatCopyTimestamp(now())}`;

	logger.info(`Using account: ${account.name}`);
	logger.info(`Source: ${sourceDir}`);
	logger.info(`Destination: ${path.resolve(options.dataDir)}`);

	const pairs: Array<[string, string]> = [
		[
			path.join(sourceDir, EXPORT_FILE_NAME),
			path.join(options.dataDir, `${baseName}.lua`),
		],
	];
	if (options.includeBak) {
		pairs.push([
			path.join(sourceDir, `${EXPORT_FILE_NAME}.bak`),
			path.join(options.dataDir, `${baseName}.lua.bak`),
		]);
	}

	const copied: string[] = [];
	for (const [src, dest] of pairs) {
		if (await copyIfExists(src, dest)) {
			copied.push(dest);
			logger.info(`Copied: ${src} -> ${dest}`);
		} else {
			logger.info(`Not found: ${src}`);
		}
	}

	return { account: account.name, copied };
}
