import { LayoutErrors, type UserErrorMessage } from "@legend-layout/constants";
import type { ConfigValidationError } from "./config/types";

/**
 * Error codes for layout operations.
 */
export enum LayoutErrorCode {
	INVALID_CONFIG = "INVALID_CONFIG",
	NULL_ENTRIES = "NULL_ENTRIES",
}

/**
 * Thrown when legend settings are rejected at configuration time.
 */
export class LegendConfigError extends Error {
	readonly code = LayoutErrorCode.INVALID_CONFIG;
	readonly userMessage: UserErrorMessage;

	constructor(public readonly errors: readonly ConfigValidationError[]) {
		super(errors.map((e) => `${e.field}: ${e.message}`).join("; "));
		this.name = "LegendConfigError";
		const [title, ...details] = LayoutErrors.INVALID_CONFIG(errors.length);
		this.userMessage = [title, ...details, ...errors.map((e) => e.message)];
	}
}

/**
 * Thrown when a layout pass is started without an entry sequence.
 */
export class LegendPreconditionError extends Error {
	readonly code = LayoutErrorCode.NULL_ENTRIES;
	readonly userMessage: UserErrorMessage = LayoutErrors.NULL_ENTRIES;

	constructor(message: string) {
		super(message);
		this.name = "LegendPreconditionError";
	}
}
