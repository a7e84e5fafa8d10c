/**
 * Error codes for conversion failures
 */
export type LuaTableErrorCode =
	| "KEY_NOT_FOUND"
	| "STRUCTURE_NOT_FOUND"
	| "UNBALANCED_STRUCTURE"
	| "MALFORMED_TABLE"
	| "NO_RECORDS_PARSED"
	| "EMPTY_SCHEMA"
	| "PRECONDITION_VIOLATED";

/**
 * Error raised by the table scanner, parser and conversion pipeline.
 *
 * Every code is terminal for the conversion it occurs in. `offset` points
 * into the text that was being scanned when the failure was detected, which
 * is not always the full document (split and record parsing work on spans).
 */
export class LuaTableError extends Error {
	override readonly name = "LuaTableError";
	readonly code: LuaTableErrorCode;
	readonly offset: number | undefined;

	constructor(code: LuaTableErrorCode, message: string, offset?: number) {
		super(message);
		this.code = code;
		this.offset = offset;
	}
}

/**
 * Narrow an unknown thrown value to a LuaTableError
 *
 * @param error - Value caught from a conversion
 * @param code - Optional code the error must carry
 */
export function isLuaTableError(
	error: unknown,
	code?: LuaTableErrorCode,
): error is LuaTableError {
	if (!(error instanceof LuaTableError)) return false;
	return code === undefined || error.code === code;
}
