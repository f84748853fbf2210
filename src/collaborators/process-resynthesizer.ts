// Constrained re-synthesizer run as an external process

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { toDot } from '../tree/dot-writer.js';
import type { ToolCommand } from '../utils/config.js';
import { formatZodIssues } from '../utils/config.js';
import { CandidateTimeoutError, ExternalToolError } from '../utils/errors.js';
import { ExecaCommandRunner, type CommandRunner } from './command-runner.js';
import {
  assertSucceeded,
  expandArgs,
  formatTimeoutSeconds,
  mentionsPlaceholder,
  parseJsonOutput,
  withWorkdir,
} from './command-template.js';
import { readOutput, type ProcessToolOptions } from './process-generator.js';
import type { ReSynthesizer, ResynthesisRequest, ResynthesisResult } from './types.js';

const ResynthesisOutputSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    value: z.number().finite(),
    nodeCount: z.number().int().nonnegative(),
    graph: z.string().optional(),
  }),
  z.object({
    status: z.literal('infeasible'),
    message: z.string().default('constraint is infeasible'),
  }),
]);

/**
 * Hands the sub-tree copy over in `{tree}` and the restriction in
 * `{constraint}`. Expects one JSON object on stdout:
 *
 *     {"status": "ok", "value": 0.93, "nodeCount": 2}
 *     {"status": "infeasible", "message": "..."}
 *
 * The replacement graph is read from `{output}`, or from `graph` in the
 * JSON when present.
 */
export class ProcessReSynthesizer implements ReSynthesizer {
  private readonly runner: CommandRunner;

  constructor(private readonly command: ToolCommand, private readonly options: ProcessToolOptions = {}) {
    this.runner = options.runner ?? new ExecaCommandRunner();
  }

  async synthesize(request: ResynthesisRequest): Promise<ResynthesisResult> {
    const tool = this.command.command;
    return withWorkdir(this.options.workdir, async (dir) => {
      const treeFile = path.join(dir, 'subtree.dot');
      const output = path.join(dir, 'replacement.dot');
      await fs.writeFile(treeFile, toDot(request.subtree, { graphName: 'subtree' }), 'utf-8');

      const args = expandArgs(tool, this.command.args, {
        model: request.model,
        spec: request.specification,
        tree: treeFile,
        output,
        constraint: request.restriction.expression,
        timeout: formatTimeoutSeconds(request.timeoutMs),
        workdir: dir,
      });

      const result = await this.runner.run(tool, args, { cwd: dir, timeoutMs: request.timeoutMs });
      if (result.timedOut) {
        throw new CandidateTimeoutError(request.timeoutMs);
      }
      assertSucceeded(tool, result);

      const parsed = ResynthesisOutputSchema.safeParse(parseJsonOutput(tool, result.stdout));
      if (!parsed.success) {
        throw new ExternalToolError(`${tool} output has an unexpected shape:\n${formatZodIssues(parsed.error).join('\n')}`, tool);
      }
      const data = parsed.data;
      if (data.status === 'infeasible') {
        return { status: 'infeasible', message: data.message };
      }

      let graph = data.graph;
      if (graph === undefined) {
        if (!mentionsPlaceholder(this.command.args, 'output')) {
          throw new ExternalToolError(`${tool} returned no graph and its arguments name no {output} file`, tool);
        }
        graph = await readOutput(tool, output);
      }
      return { status: 'ok', graph, value: data.value, nodeCount: data.nodeCount };
    });
  }
}
