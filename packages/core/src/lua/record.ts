import { LuaTableError } from "../errors";
import { interpretScalar } from "./scalar";
import { findBalancedEnd, isWhitespace } from "./scanner";
import { tableInterior } from "./splitter";
import type { LuaRecord, LuaValue, ParseOptions } from "./value";

export interface DecodedString {
	/** Decoded contents, without the quotes */
	value: string;
	/** Index just past the closing quote, or text length if unterminated */
	end: number;
	terminated: boolean;
}

/**
 * Decode a double-quoted string literal starting at `i`.
 *
 * `\n`, `\r`, `\t`, `\\` and `\"` are decoded; any other escaped character
 * is kept as that character without the backslash.
 */
export function decodeString(text: string, i: number): DecodedString {
	i++;
	let out = "";
	while (i < text.length) {
		const ch = text[i];
		if (ch === "\\" && i + 1 < text.length) {
			const next = text[i + 1];
			if (next === "n") out += "\n";
			else if (next === "r") out += "\r";
			else if (next === "t") out += "\t";
			else out += next;
			i += 2;
			continue;
		}
		if (ch === '"') return { value: out, end: i + 1, terminated: true };
		out += ch;
		i++;
	}
	return { value: out, end: text.length, terminated: false };
}

/**
 * Report a member that ends early: fatal in strict mode, otherwise the
 * caller stops reading the record.
 */
function truncatedMember(strict: boolean, message: string, offset: number) {
	if (strict) {
		throw new LuaTableError(
			"MALFORMED_TABLE",
			`${message} at offset ${offset} of record`,
			offset,
		);
	}
}

function isScalarTerminator(ch: string | undefined): boolean {
	return ch === "," || ch === "}" || ch === "\n" || ch === "\r";
}

/**
 * Parse the `["key"] = value` members of one record table.
 *
 * Nested tables are kept as raw text rather than decoded. Members without a
 * key marker (positional values) are ignored. A truncated trailing member
 * ends the record quietly in lenient mode and throws MALFORMED_TABLE in
 * strict mode.
 *
 * @param elementSpan - Balanced `{...}` text of one record
 * @param options - Parse mode, lenient by default
 * @returns Field values in order of first appearance
 *
 * @example
 * parseRecord('{ ["name"] = "Linen Cloth", ["count"] = 20, }');
 * // Map { "name" => { kind: "text", ... }, "count" => { kind: "integer", value: 20 } }
 */
export function parseRecord(
	elementSpan: string,
	options: ParseOptions = {},
): LuaRecord {
	const strict = options.mode === "strict";
	const s = tableInterior(elementSpan, "Record");
	const record: LuaRecord = new Map();

	let i = 0;
	while (i < s.length) {
		const keyStart = s.indexOf('["', i);
		if (keyStart === -1) break;

		const keyEnd = s.indexOf('"]', keyStart + 2);
		if (keyEnd === -1) {
			truncatedMember(strict, "Unterminated key marker", keyStart);
			break;
		}
		const key = s.slice(keyStart + 2, keyEnd);

		const eqPos = s.indexOf("=", keyEnd + 2);
		if (eqPos === -1) {
			truncatedMember(strict, `Missing "=" after ["${key}"]`, keyEnd);
			break;
		}
		if (strict && s.slice(keyEnd + 2, eqPos).trim() !== "") {
			truncatedMember(strict, `Unexpected text before "=" of ["${key}"]`, keyEnd + 2);
		}

		let j = eqPos + 1;
		while (j < s.length && isWhitespace(s[j])) j++;
		if (j >= s.length) {
			truncatedMember(strict, `Missing value for ["${key}"]`, eqPos);
			break;
		}

		let value: LuaValue;
		if (s[j] === '"') {
			const decoded = decodeString(s, j);
			if (!decoded.terminated) {
				truncatedMember(strict, `Unterminated string for ["${key}"]`, j);
			}
			value = { kind: "text", value: decoded.value };
			j = decoded.end;
		} else if (s[j] === "{") {
			const span = findBalancedEnd(s, j);
			value = { kind: "table", raw: s.slice(span.start, span.end) };
			j = span.end;
		} else {
			let k = j;
			while (k < s.length && !isScalarTerminator(s[k])) k++;
			value = interpretScalar(s.slice(j, k));
			j = k;
		}

		record.set(key, value);
		i = j;
	}

	return record;
}
