// Acceptance rule for re-synthesized sub-trees

import type { Objective } from './types.js';

/**
 * V_threshold = V_opt − maxLoss × (V_opt − V_base). For a minimised value
 * V_base lies above V_opt, so the threshold moves up as it should.
 */
export function valueThreshold(optimalValue: number, baselineValue: number, maxLoss: number): number {
  return optimalValue - maxLoss * (optimalValue - baselineValue);
}

export function meetsThreshold(value: number, threshold: number, objective: Objective = 'maximize'): boolean {
  return objective === 'maximize' ? value >= threshold : value <= threshold;
}

export interface AcceptanceInput {
  value: number;
  threshold: number;
  /** Decision nodes of the replacement. */
  nodeCount: number;
  /** Decision nodes of the sub-tree it would replace. */
  replacedNodeCount: number;
  objective?: Objective;
}

export type AcceptanceDecision =
  | { accepted: true }
  | { accepted: false; reason: 'below_value_threshold' | 'not_smaller' };

export function decideAcceptance(input: AcceptanceInput): AcceptanceDecision {
  if (!meetsThreshold(input.value, input.threshold, input.objective)) {
    return { accepted: false, reason: 'below_value_threshold' };
  }
  if (input.nodeCount >= input.replacedNodeCount) {
    return { accepted: false, reason: 'not_smaller' };
  }
  return { accepted: true };
}
