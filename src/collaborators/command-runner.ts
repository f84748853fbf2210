// External command execution

import execa from 'execa';
import { log } from '../utils/logger.js';

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  /** Undefined when the process never started or was killed. */
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The process could not be spawned at all. */
  spawnError?: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Quote an argument for display in debug logs only. */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`)).join(' ');
}

function isSpawnFailure(error: unknown): error is { code: string; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EACCES') &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Runs commands through execa without a shell. Never rejects for a
 * non-zero exit or a timeout; callers decide what those mean.
 */
export class ExecaCommandRunner implements CommandRunner {
  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    log.debug(`$ ${formatCommandLine(command, args)}`);
    try {
      const result = await execa(command, [...args], {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        reject: false,
        stripFinalNewline: false,
      });
      if (result.failed && !result.timedOut && typeof result.exitCode !== 'number') {
        return { stdout: result.stdout, stderr: result.stderr, timedOut: false, spawnError: result.stderr || 'process failed to start' };
      }
      return {
        exitCode: result.timedOut ? undefined : result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut: result.timedOut,
      };
    } catch (error) {
      if (isSpawnFailure(error)) {
        return { stdout: '', stderr: '', timedOut: false, spawnError: `${error.code}: ${error.message}` };
      }
      throw error;
    }
  }
}
