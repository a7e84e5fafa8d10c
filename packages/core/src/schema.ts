import { DEFAULT_DENYLIST, DEFAULT_PREFERRED_FIELDS } from "./defaults";
import { LuaTableError } from "./errors";
import type { LuaRecord } from "./lua/value";

export interface SchemaOptions {
	/** Field names never included as columns */
	denylist?: readonly string[];
	/** Columns placed first, in this order, when present */
	preferredFields?: readonly string[];
}

/**
 * Compute the export columns for a set of records.
 *
 * Columns are the union of all field names minus the denylist: present
 * preferred fields first in their fixed order, then the rest sorted. The
 * result does not depend on record order.
 *
 * @param records - Parsed records
 * @param options - Denylist and preferred order; defaults suit auction scans
 * @returns Column names, without duplicates
 * @throws LuaTableError EMPTY_SCHEMA if records exist but no column remains
 *
 * @example
 * // fields z, index, name, a with preferred [index, name]
 * // => ["index", "name", "a", "z"]
 */
export function unifySchema(
	records: readonly LuaRecord[],
	options: SchemaOptions = {},
): string[] {
	const denylist = new Set(options.denylist ?? DEFAULT_DENYLIST);
	const preferred = options.preferredFields ?? DEFAULT_PREFERRED_FIELDS;

	const fields = new Set<string>();
	for (const record of records) {
		for (const key of record.keys()) {
			if (!denylist.has(key)) fields.add(key);
		}
	}

	const ordered: string[] = [];
	for (const name of preferred) {
		if (fields.has(name) && !ordered.includes(name)) ordered.push(name);
	}
	const remaining = [...fields]
		.filter((f) => !ordered.includes(f))
		.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
	const schema = ordered.concat(remaining);

	if (records.length > 0 && schema.length === 0) {
		throw new LuaTableError(
			"EMPTY_SCHEMA",
			`Parsed ${records.length} record(s) but none has an exportable field`,
		);
	}
	return schema;
}
