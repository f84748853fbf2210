// Fast tree generator run as an external process

import { promises as fs } from 'fs';
import path from 'path';
import type { ToolCommand } from '../utils/config.js';
import { ExternalToolError } from '../utils/errors.js';
import { ExecaCommandRunner, type CommandRunner } from './command-runner.js';
import {
  assertSucceeded,
  expandArgs,
  formatTimeoutSeconds,
  mentionsPlaceholder,
  toolTimeoutMs,
  withWorkdir,
} from './command-template.js';
import type { GenerateRequest, TreeGenerator } from './types.js';

export interface ProcessToolOptions {
  runner?: CommandRunner;
  /** Parent directory for scratch files; the OS temp dir by default. */
  workdir?: string;
}

/**
 * Reads the tree graph from `{output}` when the arguments name it, from
 * stdout otherwise.
 */
export class ProcessTreeGenerator implements TreeGenerator {
  private readonly runner: CommandRunner;

  constructor(private readonly command: ToolCommand, private readonly options: ProcessToolOptions = {}) {
    this.runner = options.runner ?? new ExecaCommandRunner();
  }

  async generate(request: GenerateRequest): Promise<string> {
    const tool = this.command.command;
    return withWorkdir(this.options.workdir, async (dir) => {
      const output = path.join(dir, 'initial_tree.dot');
      const timeoutMs = request.timeoutMs ?? toolTimeoutMs(this.command);
      const args = expandArgs(tool, this.command.args, {
        model: request.model,
        spec: request.specification,
        output,
        workdir: dir,
        timeout: timeoutMs === undefined ? undefined : formatTimeoutSeconds(timeoutMs),
      });

      const result = await this.runner.run(tool, args, { cwd: dir, timeoutMs });
      if (result.timedOut) {
        throw new ExternalToolError(`${tool} timed out after ${timeoutMs ?? 0}ms`, tool, result.stderr);
      }
      assertSucceeded(tool, result);

      const graph = mentionsPlaceholder(this.command.args, 'output')
        ? await readOutput(tool, output)
        : result.stdout;
      if (!graph.trim()) {
        throw new ExternalToolError(`${tool} produced an empty tree graph`, tool, result.stderr);
      }
      return graph;
    });
  }
}

export async function readOutput(tool: string, file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new ExternalToolError(
      `${tool} did not write ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
      tool
    );
  }
}
