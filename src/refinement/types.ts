// Refinement run types

import type { ComparisonOperator, NodeId } from '../tree/types.js';

/** One branch decision: the test with the operator of the branch taken. */
export interface PathElement {
  variable: string;
  operator: ComparisonOperator;
  bound: number;
}

/** Branch decisions from the root down to, not including, a node. Empty only for the root. */
export type PathCondition = readonly PathElement[];

export interface SubProblem {
  rootId: NodeId;
  /** Node ids from the tree root to the sub-tree root, both included. */
  treePath: readonly NodeId[];
  pathCondition: PathCondition;
  /** Sub-tree height in edges; a decision node over two leaves has height 1. */
  depth: number;
  /** Decision nodes inside the sub-tree. */
  nodeCount: number;
  /** Depth of the sub-tree root in the main tree. */
  rootDepth: number;
}

/** Conjunctive restriction handed to the re-synthesizer. */
export interface StateRestriction {
  clauses: readonly PathElement[];
  expression: string;
}

export type Objective = 'maximize' | 'minimize';

export type CandidateOrder = 'deepest-first' | 'shallowest-first';

export type OrchestratorState =
  | 'initializing'
  | 'generating_initial_tree'
  | 'selecting_candidates'
  | 'refining'
  | 'done'
  | 'aborted';

export type RejectionReason =
  | 'below_value_threshold'
  | 'not_smaller'
  | 'unsupported_predicate'
  | 'infeasible_constraint'
  | 'candidate_timeout'
  | 're_verification_failed'
  | 'invalid_replacement'
  | 'evaluation_failed'
  | 'synthesis_failed';

export type SkipReason = 'invalidated' | 'no_longer_meets_thresholds';

export const OUTCOME_MESSAGES: Record<RejectionReason | SkipReason, string> = {
  below_value_threshold: 'below value threshold',
  not_smaller: 'not smaller than the replaced sub-tree',
  unsupported_predicate: 'unsupported predicate',
  infeasible_constraint: 'constraint infeasible',
  candidate_timeout: 're-synthesis timed out',
  re_verification_failed: 're-verification failed',
  invalid_replacement: 'replacement tree could not be parsed',
  evaluation_failed: 'value evaluation failed',
  synthesis_failed: 're-synthesizer failed',
  invalidated: 'inside an already replaced sub-tree',
  no_longer_meets_thresholds: 'no longer meets the selection thresholds',
};

export type CandidateStatus = 'accepted' | 'rejected' | 'skipped';

export interface CandidateRecord {
  /** Position in the selector's order, from 0. */
  index: number;
  rootId: NodeId;
  treePath: NodeId[];
  pathCondition: string;
  depth: number;
  nodeCount: number;
  status: CandidateStatus;
  reason?: RejectionReason | SkipReason;
  detail?: string;
  value?: number;
  threshold?: number;
  optimalValue?: number;
  baselineValue?: number;
  replacementNodeCount?: number;
  elapsedMs: number;
}

export interface TreeSummary {
  /** Decision nodes. */
  nodes: number;
  leaves: number;
  depth: number;
  value?: number;
}

export interface CandidateCounts {
  generated: number;
  attempted: number;
  accepted: number;
  rejected: number;
  skipped: number;
  /** Left over when the budget or the iteration cap ended the loop. */
  notAttempted: number;
}

export interface RunSummary {
  runId: string;
  state: 'done' | 'aborted';
  partial: boolean;
  abortReason?: string;
  elapsedMs: number;
  startedAt: string;
  finishedAt: string;
  initial?: TreeSummary;
  final?: TreeSummary;
  candidates: CandidateCounts;
  records: CandidateRecord[];
}
