import type { UserErrorMessage } from "./types";

/**
 * Stages of a legend layout pass.
 */
export enum LayoutPhase {
	CONFIGURE = "configure",
	MEASURE = "measure",
	VERTICAL = "vertical",
	HORIZONTAL = "horizontal",
}

/**
 * Human-readable labels for each layout phase, used in log messages.
 */
export const LayoutPhaseLabels: Record<LayoutPhase, string> = {
	[LayoutPhase.CONFIGURE]: "Configure",
	[LayoutPhase.MEASURE]: "Measure",
	[LayoutPhase.VERTICAL]: "Vertical stacking",
	[LayoutPhase.HORIZONTAL]: "Horizontal flow",
};

export const LayoutErrors = {
	NULL_ENTRIES: ["Legend entries are missing", "Pass an array of entries; an empty array is allowed"],
	INVALID_CONFIG: (count: number): UserErrorMessage => [
		"Invalid legend configuration",
		`${count} setting${count === 1 ? "" : "s"} rejected`,
	],
} as const satisfies Record<string, UserErrorMessage | ((...args: never[]) => UserErrorMessage)>;

export const ConfigErrors = {
	MAX_SIZE_PERCENT: (value: number): UserErrorMessage => [
		"maxSizePercent must be greater than 0 and at most 1",
		`Received ${value}`,
	],
	NEGATIVE_LENGTH: (field: string, value: number): UserErrorMessage => [
		`${field} must not be negative`,
		`Received ${value}`,
	],
	NOT_FINITE: (field: string, value: number): UserErrorMessage => [
		`${field} must be a finite number`,
		`Received ${value}`,
	],
	DENSITY: (value: number): UserErrorMessage => [
		"density must be greater than 0",
		`Received ${value}`,
	],
} as const;
