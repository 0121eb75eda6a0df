import { Logger, type ILogObj } from "tslog";

export { Logger };

/** Name given to loggers created without one. */
export const LEGEND_LOGGER_NAME = "legend";

/**
 * Context a legend pass attaches to its bus payloads, and so to its log lines.
 */
export interface LegendLogContext {
	/** Entries in the pass, or in the model when its data changed */
	entries?: number;
	/** Lines produced by a horizontal pass */
	lines?: number;
	neededWidth?: number;
	neededHeight?: number;
	/** Config keys touched by an accepted update */
	fields?: readonly string[];
	/** Whether the model lays out custom entries */
	custom?: boolean;
	code?: string;
	/** Config key a rejected update failed on */
	field?: string;
}

/**
 * Structured log object: a layout phase plus the pass context.
 */
export interface AppLogObj extends ILogObj, LegendLogContext {
	phase?: string;
}

/**
 * Log verbosity mode.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

/** tslog minimum levels: 2 debug, 3 info, 5 error, 7 above fatal. */
const MIN_LEVELS: Record<LogMode, number> = {
	silent: 7,
	error: 5,
	info: 3,
	debug: 2,
};

export interface LegendLoggerOptions {
	name?: string;
	mode?: LogMode;
	format?: "pretty" | "json";
}

/**
 * Create the logger a `LogSubscriber` writes legend bus events to.
 * Pretty output at info level unless told otherwise; silent mode hides
 * everything regardless of format.
 */
export function createLegendLogger(options: LegendLoggerOptions = {}): Logger<AppLogObj> {
	const { name = LEGEND_LOGGER_NAME, mode = "info", format = "pretty" } = options;
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : format,
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
	});
}

/**
 * Pretty-printing legend logger.
 */
export function createLogger(name: string = LEGEND_LOGGER_NAME, mode: LogMode = "info"): Logger<AppLogObj> {
	return createLegendLogger({ name, mode });
}

/**
 * JSON legend logger, at debug level by default so computed sizes are kept.
 */
export function createJsonLogger(name: string = LEGEND_LOGGER_NAME, mode: LogMode = "debug"): Logger<AppLogObj> {
	return createLegendLogger({ name, mode, format: "json" });
}
