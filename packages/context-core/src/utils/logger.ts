/**
 * @module @repo-context/core/logger
 * Category-scoped leveled logger writing to stderr
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  readonly category: string;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  child(category: string): Logger;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = 'REPO_CONTEXT_LOG_LEVEL';

let currentLevel: LogLevel | undefined;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);
}

/**
 * Active level: explicit setLogLevel wins, then the environment, then 'warn'
 */
export function getLogLevel(): LogLevel {
  if (currentLevel) return currentLevel;
  const fromEnv = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Override the level for the whole process; `undefined` restores env lookup
 */
export function setLogLevel(level: LogLevel | undefined): void {
  currentLevel = level;
}

class StderrLogger implements Logger {
  constructor(readonly category: string) {}

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.write('debug', msg, meta);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.write('info', msg, meta);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.write('warn', msg, meta);
  }

  error(msg: string, meta?: Record<string, unknown>): void {
    this.write('error', msg, meta);
  }

  child(category: string): Logger {
    return new StderrLogger(`${this.category}:${category}`);
  }

  private write(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: Record<string, unknown>): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[getLogLevel()]) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    process.stderr.write(`[${level}] ${this.category}: ${msg}${suffix}\n`);
  }
}

/**
 * Logger for a category such as `repo-context:scanner:walker`
 */
export function getLogger(category: string): Logger {
  return new StderrLogger(category);
}
