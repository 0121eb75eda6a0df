export type {
	BusPayload,
	ErrorPayload,
	EventHandler,
	LogPayload,
	PhasePayload,
	PhaseStats,
} from "./types";

export { LegendEventBus, isPhasePayload } from "./legend-event-bus";
