import { describe, expect, it } from "vitest";
import { keyMarker, locateArray, locateByPath } from "../src/lua/locator";
import { expectLuaTableError } from "./fixtures/test-helpers";

const nestedDoc = `DB = {
	["archive"] = {
		["rows"] = { { ["index"] = 9 } },
	},
	["lastScan"] = {
		["numItems"] = 1,
		["rows"] = { { ["index"] = 1 } },
	},
}`;

describe("keyMarker", () => {
	it("builds the bracket-quote member form", () => {
		expect(keyMarker("rows")).toBe('["rows"]');
	});
});

describe("locateArray", () => {
	it("returns the table following the marker", () => {
		const doc = 'X = { ["rows"] = { {a=1}, }, ["other"] = 2 }';
		expect(locateArray(doc, "rows")).toBe("{ {a=1}, }");
	});

	it("uses the first occurrence of the marker", () => {
		expect(locateArray(nestedDoc, "rows")).toBe('{ { ["index"] = 9 } }');
	});

	it("fails when the marker is absent", () => {
		expectLuaTableError(
			() => locateArray('X = { ["items"] = {} }', "rows"),
			"KEY_NOT_FOUND",
		);
	});

	it("does not match a bare identifier key", () => {
		expectLuaTableError(
			() => locateArray("X = { rows = {} }", "rows"),
			"KEY_NOT_FOUND",
		);
	});

	it("fails when no table follows the marker", () => {
		const error = expectLuaTableError(
			() => locateArray('X = ["rows"] = nil', "rows"),
			"STRUCTURE_NOT_FOUND",
		);
		expect(error.offset).toBe(4);
	});

	it("propagates unbalanced tables", () => {
		expectLuaTableError(
			() => locateArray('["rows"] = { {', "rows"),
			"UNBALANCED_STRUCTURE",
		);
	});
});

describe("locateByPath", () => {
	it("confines each key to the table of the previous key", () => {
		expect(locateByPath(nestedDoc, ["lastScan", "rows"])).toBe(
			'{ { ["index"] = 1 } }',
		);
	});

	it("matches locateArray for a single key", () => {
		expect(locateByPath(nestedDoc, ["rows"])).toBe(
			locateArray(nestedDoc, "rows"),
		);
	});

	it("does not find a key that only exists outside the scope", () => {
		const doc = '["rows"] = { {} }, ["lastScan"] = { ["numItems"] = 0 }';
		expectLuaTableError(
			() => locateByPath(doc, ["lastScan", "rows"]),
			"KEY_NOT_FOUND",
		);
	});

	it("rejects an empty path", () => {
		expectLuaTableError(
			() => locateByPath(nestedDoc, []),
			"PRECONDITION_VIOLATED",
		);
	});
});
