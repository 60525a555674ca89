export { formatLogRecord, isLogLevel, logger, LogLevel, type LogRecord, type LogSink } from "./logger";
export { Style, type StyleToken } from "./style";
