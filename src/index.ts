export * from "./errors";
export * from "./queryBuilder";
export * from "./request";
export * from "./sheetStore";
export { parseProjection, isAggregateExpression } from "./expression";
export type { AggregateFunction, AggregateExpression, ProjectionExpression } from "./expression";
export { coerceNumber, stringifyValue } from "./values";
export { loadConfig, getConfig, readLogSettings } from "./config";
export type { AppConfig, LogSettings } from "./config";
export { configureLogging, createLogger, Logger } from "./logger";
