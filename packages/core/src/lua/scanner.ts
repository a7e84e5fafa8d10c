import { LuaTableError } from "../errors";
import type { BraceSpan } from "./value";

/**
 * Skip over a double-quoted string literal
 *
 * A backslash escapes exactly the next character; escapes are not validated.
 *
 * @param text - Text being scanned
 * @param i - Index of the opening quote
 * @returns Index just past the closing quote, or `text.length` when the
 *   literal is unterminated
 */
export function skipString(text: string, i: number): number {
	i++;
	while (i < text.length) {
		const ch = text[i];
		if (ch === "\\") {
			i += 2;
			continue;
		}
		if (ch === '"') return i + 1;
		i++;
	}
	return text.length;
}

/**
 * Find the brace that closes the group opened at `start`
 *
 * Quoted strings are skipped whole, so braces inside them do not count.
 *
 * @param text - Text being scanned
 * @param start - Index of an opening brace
 * @returns Span of the group, `end` exclusive
 * @throws LuaTableError PRECONDITION_VIOLATED if `start` is not an opening
 *   brace, UNBALANCED_STRUCTURE if the group never closes
 */
export function findBalancedEnd(text: string, start: number): BraceSpan {
	if (!Number.isInteger(start) || start < 0 || start >= text.length) {
		throw new LuaTableError(
			"PRECONDITION_VIOLATED",
			`Start offset ${start} is outside the text (length ${text.length})`,
			start,
		);
	}
	if (text[start] !== "{") {
		throw new LuaTableError(
			"PRECONDITION_VIOLATED",
			`Expected "{" at offset ${start}, found ${JSON.stringify(text[start])}`,
			start,
		);
	}

	let depth = 0;
	let i = start;
	while (i < text.length) {
		const ch = text[i];
		if (ch === '"') {
			i = skipString(text, i);
			continue;
		}
		if (ch === "{") {
			depth++;
		} else if (ch === "}") {
			depth--;
			if (depth === 0) return { start, end: i + 1 };
		}
		i++;
	}

	throw new LuaTableError(
		"UNBALANCED_STRUCTURE",
		`Unbalanced braces: table opened at offset ${start} is never closed`,
		start,
	);
}

/**
 * Extract the balanced `{...}` group starting at `start`, braces included
 *
 * @example
 * extractBalanced('x = {a={b={}},c="}"} tail', 4); // '{a={b={}},c="}"}'
 */
export function extractBalanced(text: string, start: number): string {
	const span = findBalancedEnd(text, start);
	return text.slice(span.start, span.end);
}

export function isWhitespace(ch: string | undefined): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}
