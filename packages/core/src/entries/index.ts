export type { LegendEntry, LegendEntryOptions, LegendLabel } from "./types";
export {
	entriesFromColors,
	hasForm,
	isLabeled,
	labeledEntry,
	labelText,
	nonNegative,
	resolvedFormSize,
	stackedEntry,
} from "./entry";
