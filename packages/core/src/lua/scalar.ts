import type { LuaValue } from "./value";
import { NIL, text } from "./value";

const HEX_LITERAL = /^-?0x[0-9a-fA-F]+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Classify a bare (unquoted) literal token.
 *
 * Reserved words are checked before any numeric parse, and a token that does
 * not parse cleanly as a number is kept verbatim as text. Integers outside the
 * safe range also stay text so no digits are lost.
 *
 * @param token - Raw token, surrounding whitespace is ignored
 *
 * @example
 * interpretScalar("nil");   // { kind: "nil" }
 * interpretScalar("-0x1F"); // { kind: "integer", value: -31 }
 * interpretScalar("007");   // { kind: "text", value: "007" }
 */
export function interpretScalar(token: string): LuaValue {
	const t = token.trim();
	if (t === "") return text("");
	if (t === "true") return { kind: "boolean", value: true };
	if (t === "false") return { kind: "boolean", value: false };
	if (t === "nil") return NIL;

	if (t.startsWith("0x") || t.startsWith("-0x")) {
		if (!HEX_LITERAL.test(t)) return text(t);
		const negative = t.startsWith("-");
		const n = Number.parseInt(t.slice(negative ? 3 : 2), 16);
		if (!Number.isSafeInteger(n)) return text(t);
		return { kind: "integer", value: negative ? -n : n };
	}

	if (/[.eE]/.test(t)) {
		if (!FLOAT_LITERAL.test(t)) return text(t);
		const n = Number(t);
		return Number.isFinite(n) ? { kind: "float", value: n } : text(t);
	}

	const n = Number.parseInt(t, 10);
	if (Number.isSafeInteger(n) && String(n) === t) {
		return { kind: "integer", value: n };
	}
	return text(t);
}
