import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Coloured logger for the CLI. Everything goes to stderr so operator
 * prompts on stdout stay readable.
 */
export class ChalkLogger implements Logger {
  private threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, data?: unknown): void {
    this.emit('debug', chalk.gray(`[DEBUG] ${message}`), data);
  }

  info(message: string, data?: unknown): void {
    this.emit('info', chalk.blue(`[INFO] ${message}`), data);
  }

  warn(message: string, data?: unknown): void {
    this.emit('warn', chalk.yellow(`[WARN] ${message}`), data);
  }

  error(message: string, data?: unknown): void {
    this.emit('error', chalk.red(`[ERROR] ${message}`), data);
  }

  private emit(level: LogLevel, line: string, data?: unknown): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    if (data !== undefined) {
      console.error(line, data);
    } else {
      console.error(line);
    }
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
