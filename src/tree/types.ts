// Decision tree type definitions

/** Arena id, unique within one DecisionTree instance. */
export type NodeId = number;

export type ComparisonOperator = '<=' | '<' | '>=' | '>' | '==' | '!=';

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<=', '<', '>=', '>', '==', '!='];

export type BranchLabel = 'true' | 'false';

/** Branch visiting order used by every traversal. */
export const BRANCH_ORDER: readonly BranchLabel[] = ['true', 'false'];

/**
 * Test at a decision node; the `true` branch is taken when
 * `variable operator bound` holds.
 */
export interface Predicate {
  variable: string;
  operator: ComparisonOperator;
  bound: number;
}

interface TreeNodeBase {
  readonly id: NodeId;
  /** Root = 0. */
  readonly depth: number;
  /** Node id in the graph text this node was parsed from, if any. */
  readonly sourceId?: string;
}

export interface DecisionNode extends TreeNodeBase {
  readonly kind: 'decision';
  readonly predicate: Readonly<Predicate>;
  readonly branches: Readonly<Record<BranchLabel, NodeId>>;
}

export interface LeafNode extends TreeNodeBase {
  readonly kind: 'leaf';
  readonly action: string;
}

export type TreeNode = DecisionNode | LeafNode;

export interface TreeStats {
  /** Decision (inner) nodes. */
  decisionNodes: number;
  leaves: number;
  totalNodes: number;
  /** Height in edges; a lone leaf has depth 0. */
  depth: number;
}

/**
 * Nested, id-free description of a tree. Used to build trees in code and
 * as the JSON export shape.
 */
export type TreeSpec =
  | { type: 'leaf'; action: string }
  | { type: 'decision'; predicate: Predicate; children: Record<BranchLabel, TreeSpec> };

export interface TreeValidationIssue {
  code:
    | 'missing_node'
    | 'missing_branch'
    | 'empty_action'
    | 'unknown_action'
    | 'shared_node'
    | 'unreachable_node'
    | 'depth_mismatch';
  nodeId: NodeId;
  message: string;
}

const COMPLEMENTS: Record<ComparisonOperator, ComparisonOperator> = {
  '<=': '>',
  '>': '<=',
  '<': '>=',
  '>=': '<',
  '==': '!=',
  '!=': '==',
};

/**
 * Strict complement: the operator that holds exactly when `op` does not.
 */
export function complementOperator(op: ComparisonOperator): ComparisonOperator {
  return COMPLEMENTS[op];
}

export function formatPredicate(predicate: Predicate): string {
  return `${predicate.variable} ${predicate.operator} ${predicate.bound}`;
}

export function isLeaf(node: TreeNode): node is LeafNode {
  return node.kind === 'leaf';
}
