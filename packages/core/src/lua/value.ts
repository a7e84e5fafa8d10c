/**
 * Scalar or nested value of one record field.
 *
 * Nested tables are not decoded: `raw` holds the brace-delimited source text.
 */
export type LuaValue =
	| { kind: "nil" }
	| { kind: "boolean"; value: boolean }
	| { kind: "integer"; value: number }
	| { kind: "float"; value: number }
	| { kind: "text"; value: string }
	| { kind: "table"; raw: string };

export type LuaValueKind = LuaValue["kind"];

/**
 * One array element, keyed by field name in order of discovery
 */
export type LuaRecord = Map<string, LuaValue>;

/**
 * Offsets of a balanced `{...}` group, `end` exclusive
 */
export interface BraceSpan {
	start: number;
	end: number;
}

/**
 * How stray or truncated input is treated.
 *
 * - `lenient`: skip stray tokens and stop a record at a truncated member
 * - `strict`: fail with MALFORMED_TABLE instead
 */
export type ParseMode = "lenient" | "strict";

export interface ParseOptions {
	mode?: ParseMode;
}

export const NIL: LuaValue = { kind: "nil" };

export function text(value: string): LuaValue {
	return { kind: "text", value };
}
