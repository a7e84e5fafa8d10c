import { LuaTableError } from "../errors";
import { extractBalanced } from "./scanner";

/**
 * Build the `["key"]` member marker searched for by the locator
 */
export function keyMarker(keyName: string): string {
	return `["${keyName}"]`;
}

/**
 * Find the table assigned to `["keyName"]` without parsing the document.
 *
 * Only the first occurrence of the marker is considered, wherever it sits.
 *
 * @param document - Full saved-variables text
 * @param keyName - Member name, e.g. "rows"
 * @returns The balanced `{...}` text following the marker
 * @throws LuaTableError KEY_NOT_FOUND, STRUCTURE_NOT_FOUND or
 *   UNBALANCED_STRUCTURE
 */
export function locateArray(document: string, keyName: string): string {
	const marker = keyMarker(keyName);
	const keyPos = document.indexOf(marker);
	if (keyPos === -1) {
		throw new LuaTableError(
			"KEY_NOT_FOUND",
			`Could not find ${marker} in input`,
		);
	}

	const bracePos = document.indexOf("{", keyPos + marker.length);
	if (bracePos === -1) {
		throw new LuaTableError(
			"STRUCTURE_NOT_FOUND",
			`Could not find opening "{" after ${marker}`,
			keyPos,
		);
	}

	return extractBalanced(document, bracePos);
}

/**
 * Follow a key path through nested tables, e.g. `["lastScan", "rows"]`.
 *
 * Each key is searched for only inside the table found for the key before
 * it, so a `rows` member elsewhere in the document cannot be picked up.
 *
 * @param document - Full saved-variables text
 * @param keyPath - One or more member names, outermost first
 */
export function locateByPath(
	document: string,
	keyPath: readonly string[],
): string {
	if (keyPath.length === 0) {
		throw new LuaTableError(
			"PRECONDITION_VIOLATED",
			"Key path must name at least one key",
		);
	}

	let scope = document;
	for (const key of keyPath) {
		scope = locateArray(scope, key);
	}
	return scope;
}
