// Model value evaluator run as an external process

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { DecisionTree } from '../tree/decision-tree.js';
import { toDot } from '../tree/dot-writer.js';
import { EMPTY_RESTRICTION_EXPRESSION } from '../refinement/constraint-translator.js';
import type { StateRestriction } from '../refinement/types.js';
import type { ToolCommand } from '../utils/config.js';
import { formatZodIssues } from '../utils/config.js';
import { ExternalToolError } from '../utils/errors.js';
import { ExecaCommandRunner, type CommandRunner } from './command-runner.js';
import { assertSucceeded, expandArgs, formatTimeoutSeconds, parseJsonOutput, toolTimeoutMs, withWorkdir } from './command-template.js';
import type { ProcessToolOptions } from './process-generator.js';
import type { TreeEvaluation, ValueEvaluator } from './types.js';

export type EvaluationMode = 'tree' | 'optimal' | 'baseline';

const EvaluationOutputSchema = z.object({
  value: z.number().finite(),
  satisfied: z.boolean().default(true),
});

export interface ProcessEvaluatorOptions extends ProcessToolOptions {
  model?: string;
  specification?: string;
}

/**
 * `{mode}` selects what is evaluated: the tree in `{tree}`, or the optimal
 * or baseline policy on `{constraint}`. Expects `{"value": n, "satisfied": b}`
 * on stdout.
 */
export class ProcessValueEvaluator implements ValueEvaluator {
  private readonly runner: CommandRunner;

  constructor(private readonly command: ToolCommand, private readonly options: ProcessEvaluatorOptions = {}) {
    this.runner = options.runner ?? new ExecaCommandRunner();
  }

  async evaluateTree(tree: DecisionTree, restriction?: StateRestriction): Promise<TreeEvaluation> {
    return this.evaluate('tree', restriction, tree);
  }

  async optimalValue(restriction: StateRestriction): Promise<number> {
    return (await this.evaluate('optimal', restriction)).value;
  }

  async baselineValue(restriction: StateRestriction): Promise<number> {
    return (await this.evaluate('baseline', restriction)).value;
  }

  private async evaluate(mode: EvaluationMode, restriction?: StateRestriction, tree?: DecisionTree): Promise<TreeEvaluation> {
    const tool = this.command.command;
    return withWorkdir(this.options.workdir, async (dir) => {
      const treeFile = path.join(dir, 'evaluated_tree.dot');
      if (tree) {
        await fs.writeFile(treeFile, toDot(tree), 'utf-8');
      }
      const timeoutMs = toolTimeoutMs(this.command);
      const args = expandArgs(tool, this.command.args, {
        model: this.options.model,
        spec: this.options.specification,
        tree: tree ? treeFile : '',
        mode,
        constraint: restriction?.expression ?? EMPTY_RESTRICTION_EXPRESSION,
        timeout: timeoutMs === undefined ? undefined : formatTimeoutSeconds(timeoutMs),
        workdir: dir,
      });

      const result = await this.runner.run(tool, args, { cwd: dir, timeoutMs });
      if (result.timedOut) {
        throw new ExternalToolError(`${tool} timed out evaluating ${mode} value`, tool, result.stderr);
      }
      assertSucceeded(tool, result);

      const parsed = EvaluationOutputSchema.safeParse(parseJsonOutput(tool, result.stdout));
      if (!parsed.success) {
        throw new ExternalToolError(`${tool} output has an unexpected shape:\n${formatZodIssues(parsed.error).join('\n')}`, tool);
      }
      return parsed.data;
    });
  }
}
