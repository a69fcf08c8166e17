export { Logger, defaultLogger, silentLogger } from './Logger';
export type { LogLevel, LogSink, LoggerOptions } from './Logger';
