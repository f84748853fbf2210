// Command templates for external tools

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { ToolCommand } from '../utils/config.js';
import { ConfigurationError, ExternalToolError } from '../utils/errors.js';
import { extractJsonObject } from '../utils/json-extract.js';
import { log } from '../utils/logger.js';
import type { CommandResult, CommandRunner } from './command-runner.js';

export const PLACEHOLDERS = ['model', 'spec', 'output', 'tree', 'constraint', 'timeout', 'mode', 'workdir'] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

export type TemplateValues = Partial<Record<Placeholder, string>>;

const PLACEHOLDER_PATTERN = /\{(model|spec|output|tree|constraint|timeout|mode|workdir)\}/g;

/**
 * Substitute `{placeholder}` occurrences in every argument. Other braces
 * are left alone; a known placeholder without a value is a configuration
 * error.
 */
export function expandArgs(tool: string, args: readonly string[], values: TemplateValues): string[] {
  return args.map((arg) =>
    arg.replace(PLACEHOLDER_PATTERN, (_match, name: Placeholder) => {
      const value = values[name];
      if (value === undefined) {
        throw new ConfigurationError(`${tool}: placeholder {${name}} has no value for this call`);
      }
      return value;
    })
  );
}

export function mentionsPlaceholder(args: readonly string[], name: Placeholder): boolean {
  return args.some((arg) => arg.includes(`{${name}}`));
}

/** Seconds, rounded up, as handed to `{timeout}`. */
export function formatTimeoutSeconds(timeoutMs: number): string {
  return String(Math.max(1, Math.ceil(timeoutMs / 1000)));
}

/**
 * Run `fn` inside a fresh scratch directory that is removed afterwards.
 */
export async function withWorkdir<T>(parent: string | undefined, fn: (dir: string) => Promise<T>): Promise<T> {
  const base = parent ?? os.tmpdir();
  await fs.mkdir(base, { recursive: true });
  const dir = await fs.mkdtemp(path.join(base, 'tree-refiner-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

/**
 * Map a finished process onto success or ExternalToolError. Timeouts are
 * left to the caller.
 */
export function assertSucceeded(tool: string, result: CommandResult): void {
  if (result.spawnError !== undefined) {
    throw new ExternalToolError(`${tool} could not be started: ${result.spawnError}`, tool, result.stderr);
  }
  if (result.exitCode !== 0) {
    if (result.stderr.trim()) {
      log.debug(`${tool} stderr:\n${result.stderr.trim()}`);
    }
    throw new ExternalToolError(`${tool} exited with code ${result.exitCode ?? 'unknown'}`, tool, result.stderr);
  }
}

export function parseJsonOutput(tool: string, stdout: string): unknown {
  const extracted = extractJsonObject(stdout);
  if (!extracted.ok) {
    throw new ExternalToolError(`${tool} output is not JSON: ${extracted.error}`, tool);
  }
  return extracted.parsed;
}

export function toolTimeoutMs(command: ToolCommand, fallbackMs?: number): number | undefined {
  return command.timeout !== undefined ? command.timeout * 1000 : fallbackMs;
}

/**
 * Run `command --version`. Resolves with the first output line, or
 * undefined when the binary cannot be run.
 */
export async function checkAvailable(runner: CommandRunner, command: string): Promise<string | undefined> {
  const result = await runner.run(command, ['--version'], { timeoutMs: 10_000 });
  if (result.spawnError !== undefined || result.timedOut || result.exitCode !== 0) {
    return undefined;
  }
  const firstLine = (result.stdout.trim() || result.stderr.trim()).split('\n')[0];
  return firstLine || command;
}
