export { attachConsoleLogger, formatEvent, formatTimestamp, renderLine, type LogLevel, type LogLine, type ConsoleLoggerOptions } from './console-logger.js';
