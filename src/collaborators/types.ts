// External collaborator interfaces

import type { DecisionTree } from '../tree/decision-tree.js';
import type { StateRestriction } from '../refinement/types.js';

export interface GenerateRequest {
  model?: string;
  specification?: string;
  timeoutMs?: number;
}

/** Fast generator: turns the model and specification into a tree graph. */
export interface TreeGenerator {
  /** Resolves with the tree graph text. */
  generate(request: GenerateRequest): Promise<string>;
}

export interface ResynthesisRequest {
  model?: string;
  specification?: string;
  restriction: StateRestriction;
  /** Copy of the sub-tree being re-optimised; owned by the callee. */
  subtree: DecisionTree;
  timeoutMs: number;
}

export type ResynthesisResult =
  | { status: 'ok'; graph: string; value: number; nodeCount: number }
  | { status: 'infeasible'; message: string };

/** Constrained re-synthesizer. Timeouts reject with CandidateTimeoutError. */
export interface ReSynthesizer {
  synthesize(request: ResynthesisRequest): Promise<ResynthesisResult>;
}

export interface TreeEvaluation {
  value: number;
  /** Whether the tree still meets the specification. */
  satisfied: boolean;
}

export interface ValueEvaluator {
  evaluateTree(tree: DecisionTree, restriction?: StateRestriction): Promise<TreeEvaluation>;
  /** Value of the optimal (tabular) policy on the restricted region. */
  optimalValue(restriction: StateRestriction): Promise<number>;
  /** Value of the least-informed policy on the restricted region. */
  baselineValue(restriction: StateRestriction): Promise<number>;
}

export interface Collaborators {
  generator: TreeGenerator;
  resynthesizer: ReSynthesizer;
  evaluator: ValueEvaluator;
}
