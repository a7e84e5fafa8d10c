import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
	type ConvertOptions,
	type CsvOptions,
	convert,
	toCsv,
	UTF8_BOM,
} from "@auction-export/core";
import { defaultOutputPath, hasMatchingCsv } from "./discovery.js";
import { elapsedSeconds, type Logger } from "./logger.js";

/**
 * Decode file bytes as UTF-8, replacing invalid sequences with U+FFFD and
 * dropping a leading byte-order mark.
 */
export function decodeText(bytes: Uint8Array): string {
	const text = new TextDecoder("utf-8", { fatal: false, ignoreBOM: true }).decode(
		bytes,
	);
	return text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
}

export interface ConvertFileOptions {
	conversion?: ConvertOptions;
	csv?: CsvOptions;
}

/**
 * Convert one saved-variables file to CSV.
 *
 * The output is written only after the whole document converted, creating
 * its directory when needed.
 *
 * @returns Number of rows written
 * @throws LuaTableError when the document cannot be converted; I/O errors as raised
 */
export async function convertFile(
	inputPath: string,
	outputPath: string,
	options: ConvertFileOptions = {},
): Promise<number> {
	const text = decodeText(await fs.readFile(inputPath));
	const result = convert(text, options.conversion);
	const csv = toCsv(result, options.csv);

	await fs.mkdir(path.dirname(outputPath), { recursive: true });
	await fs.writeFile(outputPath, csv, "utf8");
	return result.rows.length;
}

export interface BatchSummary {
	converted: number;
	skipped: number;
	failed: number;
}

export interface BatchOptions extends ConvertFileOptions {
	/** Explicit output path; valid only for a single input */
	output?: string | undefined;
	/** Directory that logged paths are shown relative to */
	baseDir?: string;
}

/**
 * Convert inputs one after another, skipping those that already have a CSV.
 *
 * A failing file is logged and counted; the rest still run.
 */
export async function convertBatch(
	inputs: readonly string[],
	logger: Logger,
	options: BatchOptions = {},
): Promise<BatchSummary> {
	const baseDir = options.baseDir ?? process.cwd();
	const rel = (p: string) => path.relative(baseDir, p) || p;
	const summary: BatchSummary = { converted: 0, skipped: 0, failed: 0 };
	const total = inputs.length;

	for (const [i, inputPath] of inputs.entries()) {
		const step = `[${i + 1}/${total}]`;
		const outputPath = options.output ?? defaultOutputPath(inputPath);

		if (await hasMatchingCsv(inputPath)) {
			summary.skipped++;
			logger.info(`${step} Skip (CSV exists): ${rel(inputPath)}`);
			continue;
		}

		logger.info(`${step} Converting: ${rel(inputPath)}`);
		const start = performance.now();
		try {
			const rows = await convertFile(inputPath, outputPath, options);
			summary.converted++;
			logger.info(`Wrote ${rows} rows to: ${rel(outputPath)}`);
			logger.info(`${step} Done in ${elapsedSeconds(start)}s`);
		} catch (error) {
			summary.failed++;
			const message = error instanceof Error ? error.message : String(error);
			logger.warn(`ERROR converting ${inputPath}: ${message}`);
			if (error instanceof Error && error.stack !== undefined) {
				logger.debug(error.stack);
			}
		}
	}

	return summary;
}
