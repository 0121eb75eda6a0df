import {
	LegendDirection,
	LegendHorizontalAlignment,
	LegendOrientation,
	LegendVerticalAlignment,
} from "@legend-layout/constants";
import { LegendConfigError } from "../errors";
import type { LayoutMetrics, LegendConfig } from "./types";
import { LegendConfigValidator } from "./validator";

/**
 * Default configuration values.
 */
export const DEFAULT_LEGEND_CONFIG: LegendConfig = {
	orientation: LegendOrientation.HORIZONTAL,
	horizontalAlignment: LegendHorizontalAlignment.LEFT,
	verticalAlignment: LegendVerticalAlignment.BOTTOM,
	drawInside: false,
	direction: LegendDirection.LEFT_TO_RIGHT,
	formSize: 8,
	formToTextSpace: 5,
	xEntrySpace: 6,
	yEntrySpace: 0,
	stackSpace: 3,
	wordWrapEnabled: false,
	maxSizePercent: 0.95,
	xOffset: 5,
	yOffset: 3,
	density: 1,
};

const validator = new LegendConfigValidator();

/**
 * Merge `overrides` over the defaults (or over `base`) and validate the result.
 * @throws LegendConfigError if any setting is rejected
 */
export function createLegendConfig(
	overrides: Partial<LegendConfig> = {},
	base: LegendConfig = DEFAULT_LEGEND_CONFIG,
): LegendConfig {
	const config: LegendConfig = { ...base, ...overrides };
	const report = validator.validate(config);
	if (!report.isValid) {
		throw new LegendConfigError(report.errors);
	}
	return config;
}

/**
 * Convert every configured length by `density`.
 */
export function toLayoutMetrics(config: LegendConfig): LayoutMetrics {
	const { density } = config;
	return {
		formSize: config.formSize * density,
		formToTextSpace: config.formToTextSpace * density,
		xEntrySpace: config.xEntrySpace * density,
		yEntrySpace: config.yEntrySpace * density,
		stackSpace: config.stackSpace * density,
		xOffset: config.xOffset * density,
		yOffset: config.yOffset * density,
		density,
	};
}
