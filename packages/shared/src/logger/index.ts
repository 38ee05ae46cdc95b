export { ConsoleLogger, SilentLogger } from './consoleLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';
export type { Logger, LogLevel } from './types';
export { LOG_LEVEL_ORDER } from './types';
