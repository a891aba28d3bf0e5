/**
 * shared — Barrel exports
 */
export * from "./types.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./market-session.js";
export { Logger, createLogger, setLogStream, setLogLevel, isLogLevel, type LogLevel, type LogEntry, type LogStream } from "./logger.js";
