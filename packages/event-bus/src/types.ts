import type {
	GenericEvent,
	LayoutPhase,
	LegendEvent,
	LogLevel,
	PhaseEvent,
	UserErrorMessage,
} from "@legend-layout/constants";
import type { LegendLogContext } from "@legend-layout/logger";

/**
 * Fields shared by every payload emitted through the legend event bus.
 * Every payload carries two orthogonal dimensions: event (what happened) and level (severity).
 */
interface BasePayload {
	phase: LayoutPhase;
	timestamp: number;
}

/**
 * Payload for ERROR-level events — a rejected configuration or a violated precondition.
 */
export interface ErrorPayload extends BasePayload {
	event: LegendEvent;
	level: LogLevel.ERROR;
	message: string;
	code: string;
	userMessage: UserErrorMessage;
	/** Offending config field, when the error concerns one */
	field?: string;
}

/**
 * Payload for WARN, INFO, and DEBUG-level events — carries a log message with optional context.
 */
export interface LogPayload extends BasePayload {
	event: LegendEvent | GenericEvent;
	level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG;
	message: string;
	context?: LegendLogContext;
}

/**
 * Counts reported at a phase boundary.
 */
export type PhaseStats = Pick<LegendLogContext, "entries" | "lines">;

/**
 * Payload for phase boundary events — marks PHASE_START and PHASE_END.
 */
export interface PhasePayload extends BasePayload {
	event: PhaseEvent;
	level: LogLevel.INFO;
	stats?: PhaseStats;
}

export type BusPayload = ErrorPayload | LogPayload | PhasePayload;

/**
 * Callback type for event subscribers.
 */
export type EventHandler = (payload: BusPayload) => void;
