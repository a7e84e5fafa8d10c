/**
 * CSV serialization of converted records
 *
 * Output targets spreadsheet tools: a UTF-8 byte-order mark, CRLF line
 * endings and RFC 4180 quoting by default.
 */

import type { LuaRecord, LuaValue } from "./lua/value";

export const UTF8_BOM = "\uFEFF";

export interface CsvOptions {
	/** Field delimiter (default ",") */
	delimiter?: string;
	/** Prefix the output with a UTF-8 byte-order mark (default true) */
	bom?: boolean;
	/** Line terminator, also written after the last row (default "\r\n") */
	lineEnding?: string;
}

export interface TabularData {
	schema: string[];
	rows: string[][];
}

/**
 * Render a field value as cell text
 *
 * Absent values and nil both become empty cells.
 */
export function formatValue(value: LuaValue | undefined): string {
	if (value === undefined) return "";
	switch (value.kind) {
		case "nil":
			return "";
		case "boolean":
			return value.value ? "true" : "false";
		case "integer":
		case "float":
			return String(value.value);
		case "text":
			return value.value;
		case "table":
			return value.raw;
	}
}

/**
 * Project a record onto the schema, one cell per column
 */
export function projectRow(
	record: LuaRecord,
	schema: readonly string[],
): string[] {
	return schema.map((column) => formatValue(record.get(column)));
}

/**
 * Quote a cell when it contains the delimiter, a quote or a line break, or
 * has leading or trailing whitespace that a spreadsheet would trim.
 */
export function escapeCsvCell(cell: string, delimiter = ","): string {
	const needsQuotes =
		cell.includes(delimiter) ||
		/["\r\n]/.test(cell) ||
		/^\s|\s$/.test(cell);
	if (!needsQuotes) return cell;
	return `"${cell.replace(/"/g, '""')}"`;
}

/**
 * Serialize a header row and data rows as CSV text
 *
 * @param data - Column names and stringified rows
 * @param options - Delimiter, BOM and line ending
 */
export function toCsv(data: TabularData, options: CsvOptions = {}): string {
	const delimiter = options.delimiter ?? ",";
	const lineEnding = options.lineEnding ?? "\r\n";
	const bom = options.bom ?? true;

	const line = (cells: readonly string[]) =>
		cells.map((c) => escapeCsvCell(c, delimiter)).join(delimiter);

	const lines = [line(data.schema)];
	for (const row of data.rows) lines.push(line(row));

	return (bom ? UTF8_BOM : "") + lines.join(lineEnding) + lineEnding;
}
