import type { Logger, AppLogObj } from "@legend-layout/logger";
import { LayoutPhaseLabels, LogLevel, PhaseEvent } from "@legend-layout/constants";
import { isPhasePayload, type BusPayload } from "@legend-layout/event-bus";

/**
 * Subscribes to all payloads via bus.onAll() and routes them to the
 * appropriate Logger method based on payload level.
 *
 * Routing:
 *   ERROR, WARN  → logger.warn()
 *   INFO         → logger.info()
 *   DEBUG        → logger.debug()
 *   PhasePayload → logger.info() (with phase start/end formatting)
 */
export class LogSubscriber {
	private readonly logger: Logger<AppLogObj>;

	constructor(logger: Logger<AppLogObj>) {
		this.logger = logger;
	}

	handle(payload: BusPayload): void {
		if (isPhasePayload(payload)) {
			const label = LayoutPhaseLabels[payload.phase];
			const verb = payload.event === PhaseEvent.PHASE_START ? "started" : "ended";
			this.logger.info(`${label} layout ${verb}`, { phase: payload.phase, ...payload.stats });
			return;
		}

		switch (payload.level) {
			case LogLevel.ERROR:
				this.logger.warn(payload.message, { phase: payload.phase, code: payload.code, field: payload.field });
				break;
			case LogLevel.WARN:
				this.logger.warn(payload.message, { phase: payload.phase, ...payload.context });
				break;
			case LogLevel.INFO:
				this.logger.info(payload.message, { phase: payload.phase, ...payload.context });
				break;
			case LogLevel.DEBUG:
				this.logger.debug(payload.message, { phase: payload.phase, ...payload.context });
				break;
		}
	}
}
