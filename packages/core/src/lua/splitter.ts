import { LuaTableError } from "../errors";
import { findBalancedEnd, isWhitespace, skipString } from "./scanner";
import type { ParseOptions } from "./value";

/**
 * Strip the outer braces of a table span.
 *
 * @throws LuaTableError MALFORMED_TABLE if the trimmed span is not
 *   brace-delimited
 */
export function tableInterior(tableSpan: string, what: string): string {
	const trimmed = tableSpan.trim();
	if (!(trimmed.startsWith("{") && trimmed.endsWith("}"))) {
		throw new LuaTableError(
			"MALFORMED_TABLE",
			`${what} is not a brace-delimited table`,
		);
	}
	return trimmed.slice(1, -1);
}

/**
 * Index just past the end of a `--` line comment starting at `i`
 */
function skipLineComment(text: string, i: number): number {
	const eol = text.indexOf("\n", i);
	return eol === -1 ? text.length : eol + 1;
}

/**
 * Split an array table into its top-level `{...}` elements.
 *
 * Commas, whitespace and quoted strings between elements are skipped.
 * Other stray characters (index comments such as `-- [1]`, positional
 * scalars) are skipped in lenient mode; strict mode tolerates only `--`
 * comments and rejects anything else.
 *
 * @param tableSpan - Balanced `{...}` text of the array
 * @param options - Parse mode, lenient by default
 * @returns Element spans in source order
 */
export function splitTopLevel(
	tableSpan: string,
	options: ParseOptions = {},
): string[] {
	const strict = options.mode === "strict";
	const inner = tableInterior(tableSpan, "Array");

	const elements: string[] = [];
	let i = 0;
	while (i < inner.length) {
		const ch = inner[i];
		if (ch === "," || isWhitespace(ch)) {
			i++;
			continue;
		}
		if (ch === '"') {
			i = skipString(inner, i);
			continue;
		}
		if (ch === "-" && inner[i + 1] === "-") {
			i = skipLineComment(inner, i);
			continue;
		}
		if (ch !== "{") {
			if (strict) {
				throw new LuaTableError(
					"MALFORMED_TABLE",
					`Unexpected ${JSON.stringify(ch)} at offset ${i} of array`,
					i,
				);
			}
			i++;
			continue;
		}

		const span = findBalancedEnd(inner, i);
		elements.push(inner.slice(span.start, span.end));
		i = span.end;
	}

	return elements;
}
