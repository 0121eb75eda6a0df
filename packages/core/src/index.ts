export * from "./entries";
export * from "./config";
export * from "./layout";
export { Legend } from "./legend";
export { LegendConfigError, LegendPreconditionError, LayoutErrorCode } from "./errors";
export { LogSubscriber } from "./log-subscriber";
export { ErrorSubscriber, type LegendError } from "./error-subscriber";
