import { LogLevel, PhaseEvent, type BusEvent, type LayoutPhase } from "@legend-layout/constants";
import type { LegendLogContext } from "@legend-layout/logger";
import type { BusPayload, ErrorPayload, EventHandler, LogPayload, PhasePayload, PhaseStats } from "./types";

type LogEvent = LogPayload["event"];

/**
 * Narrow a payload to a phase boundary marker.
 */
export function isPhasePayload(payload: BusPayload): payload is PhasePayload {
	return payload.event === PhaseEvent.PHASE_START || payload.event === PhaseEvent.PHASE_END;
}

/**
 * Routes typed payloads from the layout engine to registered subscribers via three
 * independent channels: by log level, by event type, and broadcast.
 */
export class LegendEventBus {
	private levelHandlers = new Map<LogLevel, EventHandler[]>();
	private eventHandlers = new Map<BusEvent, EventHandler[]>();
	private allHandlers: EventHandler[] = [];

	/**
	 * Deliver payload synchronously to all matching handlers across all three channels:
	 * 1. Level channel — handlers registered for the payload's level
	 * 2. Event channel — handlers registered for the payload's event type
	 * 3. Broadcast channel — handlers registered via onAll()
	 */
	emit(payload: BusPayload): void {
		const levelList = this.levelHandlers.get(payload.level);
		if (levelList) {
			for (const handler of levelList) {
				handler(payload);
			}
		}

		const eventList = this.eventHandlers.get(payload.event);
		if (eventList) {
			for (const handler of eventList) {
				handler(payload);
			}
		}

		for (const handler of this.allHandlers) {
			handler(payload);
		}
	}

	// ─── Level-based registration ───

	onLevel(level: LogLevel, handler: EventHandler): void {
		addHandler(this.levelHandlers, level, handler);
	}

	offLevel(level: LogLevel, handler: EventHandler): void {
		removeHandler(this.levelHandlers.get(level), handler);
	}

	// ─── Event-based registration ───

	onEvent(event: BusEvent, handler: EventHandler): void {
		addHandler(this.eventHandlers, event, handler);
	}

	offEvent(event: BusEvent, handler: EventHandler): void {
		removeHandler(this.eventHandlers.get(event), handler);
	}

	// ─── Broadcast registration ───

	onAll(handler: EventHandler): void {
		this.allHandlers.push(handler);
	}

	offAll(handler: EventHandler): void {
		removeHandler(this.allHandlers, handler);
	}

	// ─── Convenience emit methods ───

	emitError(phase: LayoutPhase, error: Omit<ErrorPayload, "level" | "phase" | "timestamp">): void {
		const payload: ErrorPayload = { ...error, level: LogLevel.ERROR, phase, timestamp: Date.now() };
		this.emit(payload);
	}

	emitWarn(event: LogEvent, phase: LayoutPhase, message: string, context?: LegendLogContext): void {
		this.emitLog(LogLevel.WARN, event, phase, message, context);
	}

	emitInfo(event: LogEvent, phase: LayoutPhase, message: string, context?: LegendLogContext): void {
		this.emitLog(LogLevel.INFO, event, phase, message, context);
	}

	emitDebug(event: LogEvent, phase: LayoutPhase, message: string, context?: LegendLogContext): void {
		this.emitLog(LogLevel.DEBUG, event, phase, message, context);
	}

	emitPhase(event: PhaseEvent, phase: LayoutPhase, stats?: PhaseStats): void {
		const payload: PhasePayload = { event, level: LogLevel.INFO, phase, timestamp: Date.now(), stats };
		this.emit(payload);
	}

	private emitLog(
		level: LogPayload["level"],
		event: LogEvent,
		phase: LayoutPhase,
		message: string,
		context?: LegendLogContext,
	): void {
		const payload: LogPayload = { event, level, phase, timestamp: Date.now(), message, context };
		this.emit(payload);
	}
}

function addHandler<K>(map: Map<K, EventHandler[]>, key: K, handler: EventHandler): void {
	let list = map.get(key);
	if (!list) {
		list = [];
		map.set(key, list);
	}
	list.push(handler);
}

function removeHandler(list: EventHandler[] | undefined, handler: EventHandler): void {
	if (!list) return;
	const index = list.indexOf(handler);
	if (index !== -1) {
		list.splice(index, 1);
	}
}
