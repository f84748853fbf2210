/**
 * Centralized diagnostic logging.
 *
 * Writes to stderr only. Command results (summaries, JSON, rendered trees)
 * go to stdout through the commands themselves so they stay pipeable.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  useTimestamps: false,
  useColors: true,
};

/** Sink for formatted lines; stderr unless a test swaps it. */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line);
};

export class Logger {
  private config: LoggerConfig;
  private writer: LogWriter;

  constructor(config: Partial<LoggerConfig> = {}, writer: LogWriter = stderrWriter) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.writer = writer;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setWriter(writer: LogWriter): void {
    this.writer = writer;
  }

  shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private write(message: string, level: LogLevel): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.useTimestamps
      ? this.format(`[${new Date().toISOString()}] `, chalk.dim)
      : '';

    this.writer(timestamp + message + '\n');
  }

  private format(message: string, colorFn: (str: string) => string): string {
    if (this.config.useColors) {
      return colorFn(message);
    }
    return message;
  }

  debug(message: string): void {
    this.write(this.format(message, chalk.gray), LogLevel.DEBUG);
  }

  info(message: string): void {
    this.write(this.format(message, chalk.white), LogLevel.INFO);
  }

  success(message: string): void {
    this.write(this.format(message, chalk.green), LogLevel.INFO);
  }

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }

  /**
   * Log message with custom color
   */
  log(message: string, colorFn: (str: string) => string = chalk.white): void {
    this.write(this.format(message, colorFn), LogLevel.INFO);
  }

  newline(): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.writer('\n');
    }
  }

  separator(char: string = '─', length: number = 60): void {
    this.write(this.format(char.repeat(length), chalk.dim), LogLevel.INFO);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Convenience functions for direct import
 */
export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  log: (message: string, colorFn?: (str: string) => string) => logger.log(message, colorFn),
  newline: () => logger.newline(),
  separator: (char?: string, length?: number) => logger.separator(char, length),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
