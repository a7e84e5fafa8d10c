import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

const EXPORT_SUFFIXES = [".lua", ".lua.bak"] as const;

export function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function isExportFile(name: string): boolean {
	const lower = name.toLowerCase();
	return EXPORT_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

/**
 * Find every `.lua` and `.lua.bak` file under a directory, recursively.
 *
 * @param dataDir - Directory to scan
 * @returns Absolute paths sorted case-insensitively; empty when the directory is missing
 */
export async function listExportFiles(dataDir: string): Promise<string[]> {
	const found: string[] = [];

	async function walk(dir: string): Promise<void> {
		let entries: Dirent[];
		try {
			entries = await fs.readdir(dir, { withFileTypes: true });
		} catch (err) {
			if (isNotFound(err)) return;
			throw err;
		}
		for (const entry of entries) {
			const full = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				await walk(full);
			} else if (entry.isFile() && isExportFile(entry.name)) {
				found.push(path.resolve(full));
			}
		}
	}

	await walk(dataDir);
	return found.sort((a, b) => {
		const la = a.toLowerCase();
		const lb = b.toLowerCase();
		return la < lb ? -1 : la > lb ? 1 : 0;
	});
}

/**
 * Whether a CSV produced from this input already sits next to it.
 *
 * Matches any `<basename>.rows*.csv` sibling, so renamed outputs such as
 * `AuctionExport.lua.rows-old.csv` also count.
 */
export async function hasMatchingCsv(inputPath: string): Promise<boolean> {
	const prefix = `${path.basename(inputPath)}.rows`;
	let names: string[];
	try {
		names = await fs.readdir(path.dirname(inputPath));
	} catch (err) {
		if (isNotFound(err)) return false;
		throw err;
	}
	return names.some(
		(name) => name.startsWith(prefix) && name.toLowerCase().endsWith(".csv"),
	);
}

export function defaultOutputPath(inputPath: string): string {
	return `${inputPath}.rows.csv`;
}
