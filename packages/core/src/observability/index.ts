/**
 * Observability: the Drishti logging stack for Avarodha.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	getLoggingConfig,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
	LineSink,
} from "./logger.js";
