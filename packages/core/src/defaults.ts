/**
 * Default conversion settings for auction scan exports.
 *
 * The scan stores its rows under `AuctionExportDB.lastScan.rows`; the first
 * `["rows"]` member in the file is that array.
 */

export const DEFAULT_KEY_PATH: readonly string[] = ["rows"];

// Retail auction data does not expose seller names; never export the column.
export const DEFAULT_DENYLIST: readonly string[] = ["seller"];

export const DEFAULT_PREFERRED_FIELDS: readonly string[] = [
	"index",
	"name",
	"itemLink",
	"itemId",
	"count",
	"quality",
	"timeLeft",
	"minBidCopper",
	"buyoutCopper",
	"hasAllInfo",
	"scannedAtUtc",
];
