export {
	type ConversionOutcome,
	type ConversionResult,
	type ConvertOptions,
	convert,
	tryConvert,
} from "./convert";
export {
	type CsvOptions,
	escapeCsvCell,
	formatValue,
	projectRow,
	type TabularData,
	toCsv,
	UTF8_BOM,
} from "./csv";
export {
	DEFAULT_DENYLIST,
	DEFAULT_KEY_PATH,
	DEFAULT_PREFERRED_FIELDS,
} from "./defaults";
export {
	isLuaTableError,
	LuaTableError,
	type LuaTableErrorCode,
} from "./errors";
export { keyMarker, locateArray, locateByPath } from "./lua/locator";
export { type DecodedString, decodeString, parseRecord } from "./lua/record";
export { interpretScalar } from "./lua/scalar";
export {
	extractBalanced,
	findBalancedEnd,
	skipString,
} from "./lua/scanner";
export { splitTopLevel } from "./lua/splitter";
export type {
	BraceSpan,
	LuaRecord,
	LuaValue,
	LuaValueKind,
	ParseMode,
	ParseOptions,
} from "./lua/value";
export { type SchemaOptions, unifySchema } from "./schema";
