// Tree builders and in-process fakes shared by tests

import type { CommandResult, CommandRunner, RunOptions } from '../collaborators/command-runner.js';
import type {
  GenerateRequest,
  ReSynthesizer,
  ResynthesisRequest,
  ResynthesisResult,
  TreeEvaluation,
  TreeGenerator,
  ValueEvaluator,
} from '../collaborators/types.js';
import type { StateRestriction } from '../refinement/types.js';
import { DecisionTree, type TreeOptions } from '../tree/decision-tree.js';
import type { ComparisonOperator, TreeSpec } from '../tree/types.js';

export function leaf(action: string): TreeSpec {
  return { type: 'leaf', action };
}

export function decide(
  variable: string,
  operator: ComparisonOperator,
  bound: number,
  whenTrue: TreeSpec,
  whenFalse: TreeSpec
): TreeSpec {
  return { type: 'decision', predicate: { variable, operator, bound }, children: { true: whenTrue, false: whenFalse } };
}

export function buildTree(spec: TreeSpec, options?: TreeOptions): DecisionTree {
  return DecisionTree.fromSpec(spec, options);
}

/**
 * x <= 5 ? (y > 3 ? (z <= 1 ? a0 : a1) : a2) : a3
 *
 * Three decision nodes, four leaves; the `y > 3` sub-tree at depth 1 has
 * height 2 and two decision nodes.
 */
export function scenarioTree(): TreeSpec {
  return decide('x', '<=', 5, decide('y', '>', 3, decide('z', '<=', 1, leaf('a0'), leaf('a1')), leaf('a2')), leaf('a3'));
}

export const SCENARIO_DOT = `digraph policy {
  root [label="x <= 5"];
  n1 [label="y > 3"];
  n2 [label="z <= 1"];
  l0 [label="action: a0"];
  l1 [label="action: a1"];
  l2 [label="action: a2"];
  l3 [label="action: a3"];
  root -> n1 [label="true"];
  root -> l3 [label="false"];
  n1 -> n2 [label="true"];
  n1 -> l2 [label="false"];
  n2 -> l0 [label="true"];
  n2 -> l1 [label="false"];
}
`;

/** One decision node, used as a smaller replacement. */
export const REPLACEMENT_DOT = `digraph replacement {
  r [label="y > 3"];
  a [label="action: a0"];
  b [label="action: a2"];
  r -> a [label="true"];
  r -> b [label="false"];
}
`;

export class FakeClock {
  now = 1_700_000_000_000;

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export class FakeGenerator implements TreeGenerator {
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly output: string | Error) {}

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    if (this.output instanceof Error) throw this.output;
    return this.output;
  }
}

export type SynthesisHandler = (request: ResynthesisRequest, call: number) => Promise<ResynthesisResult> | ResynthesisResult;

export class FakeReSynthesizer implements ReSynthesizer {
  readonly requests: ResynthesisRequest[] = [];

  constructor(private readonly handler: SynthesisHandler) {}

  async synthesize(request: ResynthesisRequest): Promise<ResynthesisResult> {
    this.requests.push(request);
    return this.handler(request, this.requests.length - 1);
  }
}

export interface FakeEvaluatorOptions {
  /** Value of a whole tree; defaults to 10 minus its decision-node count. */
  treeValue?: (tree: DecisionTree) => number;
  satisfied?: (tree: DecisionTree) => boolean;
  optimal?: number;
  baseline?: number;
}

export class FakeEvaluator implements ValueEvaluator {
  readonly evaluatedTrees: DecisionTree[] = [];
  readonly restrictions: StateRestriction[] = [];

  constructor(private readonly options: FakeEvaluatorOptions = {}) {}

  async evaluateTree(tree: DecisionTree): Promise<TreeEvaluation> {
    this.evaluatedTrees.push(tree.clone());
    const value = this.options.treeValue ? this.options.treeValue(tree) : 10 - tree.stats().decisionNodes;
    return { value, satisfied: this.options.satisfied ? this.options.satisfied(tree) : true };
  }

  async optimalValue(restriction: StateRestriction): Promise<number> {
    this.restrictions.push(restriction);
    return this.options.optimal ?? 10;
  }

  async baselineValue(): Promise<number> {
    return this.options.baseline ?? 0;
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: (call: RecordedCall) => Promise<CommandResult> | CommandResult) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const call = { command, args: [...args], options };
    this.calls.push(call);
    return this.handler(call);
  }
}

export function ok(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: '', timedOut: false };
}
