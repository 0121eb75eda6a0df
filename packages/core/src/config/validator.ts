import { ConfigErrors } from "@legend-layout/constants";
import {
	ConfigErrorCode,
	type ConfigValidationError,
	type ConfigValidationReport,
	type LegendConfig,
} from "./types";

type LengthField =
	| "formSize"
	| "formToTextSpace"
	| "xEntrySpace"
	| "yEntrySpace"
	| "stackSpace"
	| "xOffset"
	| "yOffset";

const LENGTH_FIELDS: readonly LengthField[] = [
	"formSize",
	"formToTextSpace",
	"xEntrySpace",
	"yEntrySpace",
	"stackSpace",
	"xOffset",
	"yOffset",
];

/**
 * Validates legend settings before they reach a layout pass.
 */
export class LegendConfigValidator {
	validate(config: LegendConfig): ConfigValidationReport {
		const errors = [
			...this.validateMaxSizePercent(config.maxSizePercent),
			...this.validateDensity(config.density),
			...LENGTH_FIELDS.flatMap((field) => this.validateLength(field, config[field])),
		];

		return { isValid: errors.length === 0, errors };
	}

	/**
	 * maxSizePercent must lie in (0, 1].
	 */
	private validateMaxSizePercent(value: number): ConfigValidationError[] {
		if (Number.isFinite(value) && value > 0 && value <= 1) {
			return [];
		}
		return [
			this.createError(
				ConfigErrorCode.INVALID_MAX_SIZE_PERCENT,
				"maxSizePercent",
				ConfigErrors.MAX_SIZE_PERCENT(value)[0],
				value,
			),
		];
	}

	private validateDensity(value: number): ConfigValidationError[] {
		if (Number.isFinite(value) && value > 0) {
			return [];
		}
		return [this.createError(ConfigErrorCode.INVALID_DENSITY, "density", ConfigErrors.DENSITY(value)[0], value)];
	}

	private validateLength(field: LengthField, value: number): ConfigValidationError[] {
		if (!Number.isFinite(value)) {
			return [this.createError(ConfigErrorCode.NOT_FINITE, field, ConfigErrors.NOT_FINITE(field, value)[0], value)];
		}
		if (value < 0) {
			return [
				this.createError(
					ConfigErrorCode.NEGATIVE_LENGTH,
					field,
					ConfigErrors.NEGATIVE_LENGTH(field, value)[0],
					value,
				),
			];
		}
		return [];
	}

	private createError(
		code: ConfigErrorCode,
		field: keyof LegendConfig,
		message: string,
		value: number,
	): ConfigValidationError {
		return { code, field, message, value };
	}
}
