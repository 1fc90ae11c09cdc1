import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger with a bracketed prefix, e.g. `[cluster-autoscaler] listing devices`.
 * Diagnostics go to stderr so rendered manifests on stdout stay clean.
 */
export class Logger {
  constructor(private readonly prefix?: string) {}

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[currentLevel];
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(chalk.gray(this.format(message)));
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.error(chalk.blue(this.format(message)));
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.error(chalk.yellow(`⚠ ${this.format(message)}`));
    }
  }

  error(message: string): void {
    if (this.enabled('error')) {
      console.error(chalk.red(`✖ ${this.format(message)}`));
    }
  }
}

export function createLogger(prefix?: string): Logger {
  return new Logger(prefix);
}
