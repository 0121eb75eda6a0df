export type { Dimensions, FlowDimensions, LayoutResult, Size, TextMeasurer, Viewport } from "./types";
export { maxEntryHeight, maxEntryWidth, measureLabel } from "./metrics";
export { calculateVerticalDimensions } from "./vertical";
export { calculateHorizontalDimensions, type FlowOptions } from "./horizontal";
export { LegendLayoutEngine } from "./engine";
