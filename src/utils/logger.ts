/**
 * Structured logging for the Onboarding Analyzer
 *
 * Console lines go to stderr so that stdout stays free for CLI results.
 * The optional file sink receives one JSON object per line.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk, { type ChalkInstance } from 'chalk';
import type { LogLevel } from '../types';

const LEVELS: Record<LogLevel, { rank: number; paint: ChalkInstance }> = {
  debug: { rank: 0, paint: chalk.gray },
  info: { rank: 1, paint: chalk.cyan },
  warn: { rank: 2, paint: chalk.yellow },
  error: { rank: 3, paint: chalk.red },
  critical: { rank: 4, paint: chalk.bold.magenta },
};

export type TaskEvent = 'started' | 'completed' | 'failed';

const TASK_EVENT_LEVELS: Record<TaskEvent, LogLevel> = {
  started: 'debug',
  completed: 'info',
  failed: 'warn',
};

export interface LogContext {
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function formatEntry(key: string, value: unknown): string {
  // durationMs=12 reads as duration=12ms
  if (typeof value === 'number' && key.endsWith('Ms') && key.length > 2) {
    return `${key.slice(0, -2)}=${value}ms`;
  }
  if (typeof value === 'string' && /^\S+$/.test(value)) {
    return `${key}=${value}`;
  }
  return `${key}=${JSON.stringify(value)}`;
}

/**
 * Render context as `key=value` pairs for a console line
 */
export function formatContext(context: LogContext = {}): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => formatEntry(key, value))
    .join(' ');
}

class Logger {
  private config: LoggerConfig;
  private minRank: number;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.minRank = LEVELS[config.level].rank;

    if (config.file) {
      const dir = dirname(config.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level].rank >= this.minRank;
  }

  private log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();

    if (this.config.console) {
      const details = formatContext(context);
      const label = LEVELS[level].paint(level.toUpperCase().padEnd(8));
      console.error(
        `${chalk.dim(timestamp)} ${label} ${message}${details ? ` ${chalk.dim(details)}` : ''}`
      );
    }

    if (this.config.file) {
      appendFileSync(this.config.file, JSON.stringify({ timestamp, level, message, ...context }) + '\n');
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.log('critical', message, context);
  }

  taskEvent(event: TaskEvent, task: string, context?: LogContext): void {
    this.log(TASK_EVENT_LEVELS[event], `task_${event}`, { task, ...context });
  }

  /**
   * Log a served HTTP request, at warn for 4xx and error for 5xx
   */
  request(method: string, path: string, status: number, durationMs: number): void {
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    this.log(level, 'http_request', { method, path, status, durationMs });
  }
}

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: 'info', console: true });
  }
  return globalLogger;
}

export { Logger };
