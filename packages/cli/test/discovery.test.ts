import * as path from "node:path";
import { describe, expect, it } from "vitest";
import {
	defaultOutputPath,
	hasMatchingCsv,
	isExportFile,
	listExportFiles,
} from "../src/discovery";
import { withTempDir, writeFile } from "./fixtures/test-helpers";

describe("isExportFile", () => {
	it("matches .lua and .lua.bak in any case", () => {
		expect(isExportFile("AuctionExport.lua")).toBe(true);
		expect(isExportFile("AuctionExport.LUA.BAK")).toBe(true);
		expect(isExportFile("AuctionExport.lua.rows.csv")).toBe(false);
		expect(isExportFile("AuctionExport.bak")).toBe(false);
	});
});

describe("listExportFiles", () => {
	it("finds exports recursively, sorted case-insensitively", async () => {
		await withTempDir(async (dir) => {
			const data = path.join(dir, "data");
			await writeFile(path.join(data, "b.LUA"), "");
			await writeFile(path.join(data, "A.lua"), "");
			await writeFile(path.join(data, "sub", "c.lua.bak"), "");
			await writeFile(path.join(data, "notes.txt"), "");
			await writeFile(path.join(data, "A.lua.rows.csv"), "");

			expect(await listExportFiles(data)).toEqual([
				path.join(data, "A.lua"),
				path.join(data, "b.LUA"),
				path.join(data, "sub", "c.lua.bak"),
			]);
		});
	});

	it("returns nothing for a missing directory", async () => {
		await withTempDir(async (dir) => {
			expect(await listExportFiles(path.join(dir, "missing"))).toEqual([]);
		});
	});
});

describe("hasMatchingCsv", () => {
	it("matches any <basename>.rows*.csv sibling", async () => {
		await withTempDir(async (dir) => {
			const input = await writeFile(path.join(dir, "AuctionExport.lua"), "");
			expect(await hasMatchingCsv(input)).toBe(false);

			await writeFile(path.join(dir, "AuctionExport.lua.csv"), "");
			await writeFile(path.join(dir, "Other.lua.rows.csv"), "");
			expect(await hasMatchingCsv(input)).toBe(false);

			await writeFile(path.join(dir, "AuctionExport.lua.rows-old.CSV"), "");
			expect(await hasMatchingCsv(input)).toBe(true);
		});
	});

	it("is false when the directory does not exist", async () => {
		await withTempDir(async (dir) => {
			expect(await hasMatchingCsv(path.join(dir, "gone", "a.lua"))).toBe(false);
		});
	});
});

describe("defaultOutputPath", () => {
	it("appends .rows.csv to the input path", () => {
		expect(defaultOutputPath(path.join("data", "AuctionExport.lua.bak"))).toBe(
			path.join("data", "AuctionExport.lua.bak.rows.csv"),
		);
	});
});
