/**
 * Centralized error handler with stack trace logging
 * Provides consistent error reporting across CLI commands
 */

import chalk from 'chalk';
import { ConfigurationError, isRefinementError } from './errors.js';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
  /** Whether to suppress output (for JSON mode, etc.) */
  silent?: boolean;
}

export function isDebugEnvironment(): boolean {
  return process.env.NODE_ENV === 'development' || !!process.env.DEBUG;
}

export class ErrorHandler {
  static formatError(error: unknown, options: ErrorHandlingOptions = {}): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    const code = isRefinementError(error) ? ` (${error.code})` : '';
    output.push(chalk.red(`${this.getErrorMessage(error)}${code}`));

    if (error instanceof ConfigurationError && error.issues.length > 0) {
      for (const issue of error.issues) {
        output.push(chalk.yellow(issue));
      }
    }

    const stackTrace = this.getStackTrace(error);
    if (options.includeStack && stackTrace) {
      output.push('');
      output.push(chalk.dim('Stack trace:'));
      output.push(chalk.gray(stackTrace));
    }

    output.push('');

    return output.join('\n');
  }

  /**
   * Report an error on stderr once and optionally exit
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const { includeStack = isDebugEnvironment(), context, exitProcess = false, exitCode = 1, silent = false } = options;

    if (!silent) {
      process.stderr.write(this.formatError(error, { includeStack, context }));
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }

  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static getStackTrace(error: unknown): string | undefined {
    if (error instanceof Error) {
      return error.stack;
    }
    return undefined;
  }
}

/**
 * Convenience function for quick error handling
 */
export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}

export function getErrorMessage(error: unknown): string {
  return ErrorHandler.getErrorMessage(error);
}

/**
 * Common error patterns for checking
 */
export const ErrorPatterns = {
  FILE_NOT_FOUND: /enoent|no such file|file not found|cannot find/i,
};
