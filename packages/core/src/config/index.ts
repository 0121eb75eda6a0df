export type { ConfigValidationError, ConfigValidationReport, LayoutMetrics, LegendConfig } from "./types";
export { ConfigErrorCode } from "./types";
export { LegendConfigValidator } from "./validator";
export { DEFAULT_LEGEND_CONFIG, createLegendConfig, toLayoutMetrics } from "./defaults";
