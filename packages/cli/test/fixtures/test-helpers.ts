import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { CommandContext } from "../../src/commands/context";
import type { LogSink } from "../../src/logger";

/**
 * Common test utilities for cli package tests
 */

/** Two records; the seller field is dropped on export */
export const SAMPLE_DOCUMENT = `AuctionExportDB = {
	["lastScan"] = {
		["rows"] = {
			{
				["index"] = 1,
				["name"] = "Copper Ore",
				["seller"] = "Test Seller",
				["buyoutCopper"] = 1500,
			}, -- [1]
			{
				["index"] = 2,
				["name"] = "Tin Ore",
				["count"] = 4,
			}, -- [2]
		},
	},
}
`;

export const SAMPLE_CSV =
	"\uFEFFindex,name,count,buyoutCopper\r\n1,Copper Ore,,1500\r\n2,Tin Ore,4,\r\n";

/** 2026-10-18 21:04:11 local time */
export const FIXED_DATE = new Date(2026, 9, 18, 21, 4, 11);

export interface CapturedSink extends LogSink {
	text(): string;
	lines(): string[];
}

export function captureSink(): CapturedSink {
	const chunks: string[] = [];
	return {
		write(chunk: string) {
			chunks.push(chunk);
			return true;
		},
		text: () => chunks.join(""),
		lines: () => chunks.join("").split("\n").filter((l) => l !== ""),
	};
}

/**
 * Log lines with the timestamp prefix removed
 */
export function messages(sink: CapturedSink): string[] {
	return sink.lines().map((l) => l.replace(/^\d{4}-\d\d-\d\d \d\d:\d\d:\d\d /, ""));
}

export interface TestContext extends CommandContext {
	stdout: CapturedSink;
	stderr: CapturedSink;
	/** Questions asked through the prompt */
	questions: string[];
}

/**
 * Command context writing to captured sinks and answering prompts in order
 */
export function createTestContext(
	cwd: string,
	answers: readonly string[] = [],
): TestContext {
	const questions: string[] = [];
	const pending = [...answers];
	return {
		stdout: captureSink(),
		stderr: captureSink(),
		cwd,
		questions,
		prompt: async (question) => {
			questions.push(question);
			const answer = pending.shift();
			if (answer === undefined) throw new Error("No answer left for prompt");
			return answer;
		},
		now: () => FIXED_DATE,
	};
}

/**
 * Run a callback with a fresh temporary directory, removed afterwards
 */
export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
): Promise<T> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "auction-export-"));
	try {
		return await fn(dir);
	} finally {
		await fs.rm(dir, { recursive: true, force: true });
	}
}

export async function writeFile(
	filePath: string,
	content: string | Uint8Array,
): Promise<string> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, content);
	return filePath;
}

/**
 * Build `<root>/<account>/SavedVariables/` folders, with an export file
 * in each listed account
 */
export async function makeAccountRoot(
	root: string,
	accounts: Record<string, { lua?: string; bak?: string }>,
): Promise<void> {
	await fs.mkdir(root, { recursive: true });
	for (const [name, files] of Object.entries(accounts)) {
		const dir = path.join(root, name, "SavedVariables");
		await fs.mkdir(dir, { recursive: true });
		if (files.lua !== undefined) {
			await writeFile(path.join(dir, "AuctionExport.lua"), files.lua);
		}
		if (files.bak !== undefined) {
			await writeFile(path.join(dir, "AuctionExport.lua.bak"), files.bak);
		}
	}
}
