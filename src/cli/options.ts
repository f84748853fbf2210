// Shared option parsing for CLI commands

import { InvalidArgumentError } from 'commander';
import { promises as fs } from 'fs';
import { ErrorPatterns, getErrorMessage } from '../utils/error-handler.js';
import { ConfigurationError } from '../utils/errors.js';
import { LogLevel, logger } from '../utils/logger.js';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

/** Selector thresholds shared by `refine` and `inspect`. */
export interface SelectionFlags {
  maxSubtreeDepth?: number;
  minSubtreeDepth?: number;
  minNodeCount?: number;
  includeRoot?: boolean;
  order?: string;
}

export interface LoggingFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export function selectionOverrides(flags: SelectionFlags): Record<string, unknown> {
  return definedOnly({
    maxSubtreeDepth: flags.maxSubtreeDepth,
    minSubtreeDepth: flags.minSubtreeDepth,
    minNodeCount: flags.minNodeCount,
    includeRoot: flags.includeRoot,
    candidateOrder: flags.order,
  });
}

export function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * `--verbose` and `--quiet` win over the configured level; returns whether
 * either was given.
 */
export function applyLoggingFlags(flags: LoggingFlags): boolean {
  if (flags.verbose) {
    logger.setLevel(LogLevel.DEBUG);
    return true;
  }
  if (flags.quiet) {
    logger.setLevel(LogLevel.WARN);
    return true;
  }
  return false;
}

export async function readInputFile(file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (ErrorPatterns.FILE_NOT_FOUND.test(getErrorMessage(error))) {
      throw new ConfigurationError(`File not found: ${file}`);
    }
    throw error;
  }
}
