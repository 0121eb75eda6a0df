import { LogLevel, type UserErrorMessage } from "@legend-layout/constants";
import type { BusPayload } from "@legend-layout/event-bus";

/**
 * An error reported on the bus during configuration or a layout pass.
 */
export interface LegendError {
	phase: string;
	code: string;
	message: string;
	field?: string;
	userMessage: UserErrorMessage;
}

/**
 * Subscribes to ERROR-level payloads via bus.onLevel(LogLevel.ERROR) and
 * accumulates them as LegendError[].
 */
export class ErrorSubscriber {
	readonly errors: LegendError[] = [];

	get count(): number {
		return this.errors.length;
	}

	handle(payload: BusPayload): void {
		if (payload.level !== LogLevel.ERROR) {
			return;
		}

		this.errors.push({
			phase: payload.phase,
			code: payload.code,
			message: payload.message,
			field: payload.field,
			userMessage: payload.userMessage,
		});
	}
}
