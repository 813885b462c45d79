export * from "./circuit/index.js";
export * from "./config/circuitOptions.js";
export { StructuredLogger, LOG_LEVELS, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { ERROR_CATALOG, ERROR_CODES, errorFamilyOf, type ErrorCode, type ErrorFamily } from "./types.js";
