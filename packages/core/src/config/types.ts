import type {
	LegendDirection,
	LegendHorizontalAlignment,
	LegendOrientation,
	LegendVerticalAlignment,
} from "@legend-layout/constants";

/**
 * Externally configured legend settings, read-only during a layout pass.
 * Lengths are in unconverted units and are multiplied by `density` once per pass.
 */
export interface LegendConfig {
	readonly orientation: LegendOrientation;
	readonly horizontalAlignment: LegendHorizontalAlignment;
	readonly verticalAlignment: LegendVerticalAlignment;
	/** Whether the renderer places the legend over the chart content */
	readonly drawInside: boolean;
	/** Passed through to the renderer untouched */
	readonly direction: LegendDirection;
	readonly formSize: number;
	readonly formToTextSpace: number;
	/** Space between groups on the same line */
	readonly xEntrySpace: number;
	/** Space between rows (vertical) or added to line spacing (horizontal) */
	readonly yEntrySpace: number;
	/** Space between consecutive stacked forms */
	readonly stackSpace: number;
	readonly wordWrapEnabled: boolean;
	/** Fraction of the available width lines may use before wrapping, in (0, 1] */
	readonly maxSizePercent: number;
	readonly xOffset: number;
	readonly yOffset: number;
	/** Multiplier converting configured lengths into the engine's linear unit */
	readonly density: number;
}

/**
 * Config lengths converted into the engine's linear unit.
 */
export interface LayoutMetrics {
	readonly formSize: number;
	readonly formToTextSpace: number;
	readonly xEntrySpace: number;
	readonly yEntrySpace: number;
	readonly stackSpace: number;
	readonly xOffset: number;
	readonly yOffset: number;
	readonly density: number;
}

/**
 * Error codes reported by the config validator.
 */
export enum ConfigErrorCode {
	INVALID_MAX_SIZE_PERCENT = "INVALID_MAX_SIZE_PERCENT",
	NEGATIVE_LENGTH = "NEGATIVE_LENGTH",
	NOT_FINITE = "NOT_FINITE",
	INVALID_DENSITY = "INVALID_DENSITY",
}

export interface ConfigValidationError {
	code: ConfigErrorCode;
	field: keyof LegendConfig;
	message: string;
	value: number;
}

export interface ConfigValidationReport {
	isValid: boolean;
	errors: ConfigValidationError[];
}
