import { projectRow } from "./csv";
import type { TabularData } from "./csv";
import { DEFAULT_KEY_PATH } from "./defaults";
import { LuaTableError } from "./errors";
import { locateByPath } from "./lua/locator";
import { parseRecord } from "./lua/record";
import { splitTopLevel } from "./lua/splitter";
import type { ParseMode } from "./lua/value";
import { unifySchema } from "./schema";
import type { SchemaOptions } from "./schema";

export interface ConvertOptions extends SchemaOptions {
	/** Member names leading to the record array, outermost first */
	keyPath?: readonly string[];
	/** Stray-token handling (default "lenient") */
	mode?: ParseMode;
}

/**
 * Columns and stringified rows extracted from one document
 */
export type ConversionResult = TabularData;

export type ConversionOutcome =
	| { success: true; result: ConversionResult }
	| { success: false; error: LuaTableError };

/**
 * Extract the record array from a saved-variables document as table rows.
 *
 * Pure and deterministic: no I/O, and the same text always yields the same
 * schema and row order.
 *
 * @param text - Full document text
 * @param options - Key path, parse mode, denylist and preferred columns
 * @returns Schema plus one row per record
 * @throws LuaTableError on any failure; nothing partial is returned
 *
 * @example
 * const { schema, rows } = convert(savedVariables);
 * const csv = toCsv({ schema, rows });
 */
export function convert(
	text: string,
	options: ConvertOptions = {},
): ConversionResult {
	const parseOptions = { mode: options.mode ?? "lenient" } as const;
	const keyPath = options.keyPath ?? DEFAULT_KEY_PATH;

	const arraySpan = locateByPath(text, keyPath);
	const records = splitTopLevel(arraySpan, parseOptions).map((element) =>
		parseRecord(element, parseOptions),
	);

	if (records.length === 0) {
		const marker = keyPath.map((k) => `["${k}"]`).join(" > ");
		throw new LuaTableError(
			"NO_RECORDS_PARSED",
			`Parsed 0 rows from ${marker}`,
		);
	}

	const schema = unifySchema(records, options);
	const rows = records.map((record) => projectRow(record, schema));
	return { schema, rows };
}

/**
 * Run {@link convert}, returning conversion errors instead of throwing them
 */
export function tryConvert(
	text: string,
	options: ConvertOptions = {},
): ConversionOutcome {
	try {
		return { success: true, result: convert(text, options) };
	} catch (error) {
		if (error instanceof LuaTableError) {
			return { success: false, error };
		}
		throw error;
	}
}
