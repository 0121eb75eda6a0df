export type { UserErrorMessage } from "./types";
export { LayoutPhase, LayoutPhaseLabels, LayoutErrors, ConfigErrors } from "./layout";
export {
	LegendForm,
	LegendOrientation,
	LegendHorizontalAlignment,
	LegendVerticalAlignment,
	LegendDirection,
	LegendColors,
} from "./legend";
export { LogLevel, GenericEvent, PhaseEvent, LegendEvent, type BusEvent } from "./events";
