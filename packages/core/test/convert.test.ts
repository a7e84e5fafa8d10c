import { describe, expect, it } from "vitest";
import { convert, tryConvert } from "../src/convert";
import { toCsv } from "../src/csv";
import { expectLuaTableError, readFixture } from "./fixtures/test-helpers";

const SCANNED_AT = "2026-10-18T21:04:11Z";

describe("convert", () => {
	const document = readFixture("AuctionExport.lua");

	it("returns one row per record with a unified schema", () => {
		const { schema, rows } = convert(document);

		expect(schema).toEqual([
			"index",
			"name",
			"itemId",
			"count",
			"quality",
			"timeLeft",
			"minBidCopper",
			"buyoutCopper",
			"hasAllInfo",
			"scannedAtUtc",
			"bonusIds",
			"note",
		]);
		expect(rows).toHaveLength(3);
		expect(rows[0]).toEqual([
			"1",
			"Linen Cloth",
			"2589",
			"20",
			"1",
			"3",
			"1500",
			"2000",
			"true",
			SCANNED_AT,
			"",
			"",
		]);
		expect(rows[1]).toEqual([
			"2",
			'Peacebloom, "fresh"',
			"2447",
			"5",
			"1",
			"2",
			"80",
			"",
			"false",
			SCANNED_AT,
			"",
			"",
		]);
	});

	it("decodes hex integers, raw nested tables and escaped newlines", () => {
		const row = convert(document).rows[2];
		expect(row?.slice(0, 4)).toEqual(["3", "", "31", "1"]);
		expect(row?.[10]).toMatch(/^\{\s*6652, -- \[1\]\s*1487, -- \[2\]\s*\}$/);
		expect(row?.[11]).toBe("line one\nline two");
	});

	it("never emits the denylisted seller field", () => {
		const result = convert(document);
		expect(result.schema).not.toContain("seller");
		expect(result.rows.flat()).not.toContain("Test Seller");
	});

	it("is idempotent", () => {
		expect(convert(document)).toEqual(convert(document));
	});

	it("finds the same array through an explicit key path", () => {
		expect(convert(document, { keyPath: ["lastScan", "rows"] })).toEqual(
			convert(document),
		);
	});

	it("applies custom denylist and preferred fields", () => {
		const { schema } = convert(document, {
			denylist: ["bonusIds", "note", "scannedAtUtc"],
			preferredFields: ["name", "index"],
		});
		expect(schema).toEqual([
			"name",
			"index",
			"buyoutCopper",
			"count",
			"hasAllInfo",
			"itemId",
			"minBidCopper",
			"quality",
			"seller",
			"timeLeft",
		]);
	});

	it("serializes to spreadsheet CSV", () => {
		const csv = toCsv(convert(document));
		const lines = csv.split("\r\n");
		expect(lines[0]).toBe(
			"\uFEFFindex,name,itemId,count,quality,timeLeft,minBidCopper,buyoutCopper,hasAllInfo,scannedAtUtc,bonusIds,note",
		);
		expect(lines[2]).toBe(
			`2,"Peacebloom, ""fresh""",2447,5,1,2,80,,false,${SCANNED_AT},,`,
		);
	});

	it("fails when the document has no rows key", () => {
		expectLuaTableError(
			() => convert('AuctionExportDB = { ["settings"] = {} }'),
			"KEY_NOT_FOUND",
		);
	});

	it("fails on an empty rows array", () => {
		const error = expectLuaTableError(
			() => convert('AuctionExportDB = { ["rows"] = {} }'),
			"NO_RECORDS_PARSED",
		);
		expect(error.message).toBe('Parsed 0 rows from ["rows"]');
	});

	it("fails when records have no fields", () => {
		expectLuaTableError(
			() => convert('X = { ["rows"] = { {}, {} } }'),
			"EMPTY_SCHEMA",
		);
	});

	it("fails on a truncated document", () => {
		const truncated = document.slice(0, document.indexOf('["note"]'));
		expectLuaTableError(() => convert(truncated), "UNBALANCED_STRUCTURE");
	});

	it("skips stray array tokens only in lenient mode", () => {
		const input = 'X = { ["rows"] = { 1, { ["a"] = 1 } } }';
		expect(convert(input).rows).toEqual([["1"]]);
		expectLuaTableError(
			() => convert(input, { mode: "strict" }),
			"MALFORMED_TABLE",
		);
	});
});

describe("tryConvert", () => {
	it("returns the result on success", () => {
		const outcome = tryConvert('X = { ["rows"] = { { ["a"] = "b" } } }');
		expect(outcome).toEqual({
			success: true,
			result: { schema: ["a"], rows: [["b"]] },
		});
	});

	it("returns the error instead of throwing", () => {
		const outcome = tryConvert("X = {}");
		expect(outcome.success).toBe(false);
		if (outcome.success) throw new Error("expected failure");
		expect(outcome.error.code).toBe("KEY_NOT_FOUND");
	});
});
