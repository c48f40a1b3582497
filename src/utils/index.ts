/**
 * Utility modules export
 */

export { Logger, formatContext, initLogger, getLogger, isLogLevel } from './logger';
export type { LogContext, LoggerConfig, TaskEvent } from './logger';
