// Sub-problem selection over a decision tree

import type { DecisionTree } from '../tree/decision-tree.js';
import { complementOperator, type NodeId } from '../tree/types.js';
import type { CandidateOrder, PathCondition, PathElement, SubProblem } from './types.js';

export type SubProblemComparator = (a: SubProblem, b: SubProblem) => number;

export interface SelectorOptions {
  /** Candidates are rooted at depth < maxRootDepth. */
  maxRootDepth: number;
  minSubtreeDepth?: number;
  minNodeCount?: number;
  /** Allow the tree root itself as a candidate. */
  includeRoot?: boolean;
  order?: CandidateOrder;
  /** Takes precedence over `order`. */
  comparator?: SubProblemComparator;
}

export const DEFAULT_MIN_SUBTREE_DEPTH = 3;
export const DEFAULT_MIN_NODE_COUNT = 2;

export const CANDIDATE_COMPARATORS: Record<CandidateOrder, SubProblemComparator> = {
  'deepest-first': (a, b) => b.depth - a.depth,
  'shallowest-first': (a, b) => a.depth - b.depth,
};

/**
 * Depth-first walk emitting every decision node that roots a large enough
 * sub-tree. Candidates may nest. The result is sorted stably, so ties keep
 * pre-order (`true` branch first).
 */
export function selectSubProblems(tree: DecisionTree, options: SelectorOptions): SubProblem[] {
  const minSubtreeDepth = options.minSubtreeDepth ?? DEFAULT_MIN_SUBTREE_DEPTH;
  const minNodeCount = options.minNodeCount ?? DEFAULT_MIN_NODE_COUNT;
  const includeRoot = options.includeRoot ?? false;
  const found: SubProblem[] = [];

  const visit = (id: NodeId, pathCondition: PathElement[], treePath: NodeId[]): void => {
    const node = tree.requireNode(id);
    if (node.kind === 'leaf' || node.depth >= options.maxRootDepth) return;

    const isRoot = treePath.length === 1;
    if (!isRoot || includeRoot) {
      const stats = tree.subtreeStats(id);
      if (stats.depth >= minSubtreeDepth && stats.decisionNodes >= minNodeCount) {
        found.push({
          rootId: id,
          treePath: [...treePath],
          pathCondition: [...pathCondition],
          depth: stats.depth,
          nodeCount: stats.decisionNodes,
          rootDepth: node.depth,
        });
      }
    }

    const { variable, operator, bound } = node.predicate;
    visit(node.branches.true, [...pathCondition, { variable, operator, bound }], [...treePath, node.branches.true]);
    visit(
      node.branches.false,
      [...pathCondition, { variable, operator: complementOperator(operator), bound }],
      [...treePath, node.branches.false]
    );
  };

  visit(tree.rootId, [], [tree.rootId]);

  const comparator = options.comparator ?? CANDIDATE_COMPARATORS[options.order ?? 'deepest-first'];
  // Array.prototype.sort is stable.
  return found.sort(comparator);
}

/** `root` for the empty path, otherwise `x<=5 AND y>3`. */
export function formatPathCondition(pathCondition: PathCondition): string {
  if (pathCondition.length === 0) return 'root';
  return pathCondition.map((e) => `${e.variable}${e.operator}${e.bound}`).join(' AND ');
}

/** True when `prefix` is a leading segment of `path` (or equal to it). */
export function isPathPrefix(prefix: readonly NodeId[], path: readonly NodeId[]): boolean {
  if (prefix.length > path.length) return false;
  return prefix.every((id, i) => path[i] === id);
}
