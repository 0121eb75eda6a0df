/**
 * Log severity level — orthogonal to event types.
 */
export enum LogLevel {
	ERROR = "ERROR",
	WARN = "WARN",
	INFO = "INFO",
	DEBUG = "DEBUG",
}

/**
 * Tier 1 — Generic events not tied to a specific domain.
 */
export enum GenericEvent {
	LOG = "LOG",
}

/**
 * Tier 2 — Layout pass boundary markers.
 */
export enum PhaseEvent {
	PHASE_START = "PHASE_START",
	PHASE_END = "PHASE_END",
}

/**
 * Tier 3 — Legend events.
 */
export enum LegendEvent {
	CONFIG_CHANGED = "CONFIG_CHANGED",
	CONFIG_REJECTED = "CONFIG_REJECTED",
	DATA_CHANGED = "DATA_CHANGED",
	LAYOUT_COMPUTED = "LAYOUT_COMPUTED",
	PRECONDITION_FAILED = "PRECONDITION_FAILED",
}

/**
 * Union of all event types across all tiers.
 */
export type BusEvent = GenericEvent | PhaseEvent | LegendEvent;
