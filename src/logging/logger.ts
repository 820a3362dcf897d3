/**
 * Levelled logger for harness progress and protocol transcripts
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric values for log levels (for comparison)
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

/**
 * Receives each formatted line
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  /** Defaults to console.log/console.error */
  sink?: LogSink;
  /** Colour the level tag (default: true) */
  color?: boolean;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return String(value);
}

export class Logger {
  private readonly name: string;
  private minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly color: boolean;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? consoleSink;
    this.color = options.color ?? true;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.minLevel];
  }

  /**
   * Logger sharing this one's sink and level under a sub-name
   */
  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, {
      minLevel: this.minLevel,
      sink: this.sink,
      color: this.color
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const tag = `[${level.toUpperCase()}]`;
    const parts = [this.color ? LEVEL_STYLE[level](tag) : tag, `[${this.name}]`, message];

    if (data) {
      for (const [key, value] of Object.entries(data)) {
        if (value !== undefined) {
          parts.push(`${key}=${formatValue(value)}`);
        }
      }
    }

    this.sink(level, parts.join(' '));
  }
}

export function createLogger(name: string, options?: LoggerOptions): Logger {
  return new Logger(name, options);
}
