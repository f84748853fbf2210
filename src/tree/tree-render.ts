// Plain-text tree rendering for terminals and exported artifacts

import type { DecisionTree } from './decision-tree.js';
import { formatActionLabel } from './label-grammar.js';
import { BRANCH_ORDER, formatPredicate, type NodeId, type TreeNode } from './types.js';

export const TREE_CHARS = {
  branch: '├─',
  lastBranch: '└─',
  vertical: '│  ',
  space: '   ',
} as const;

export interface RenderOptions {
  /** Applied to decision labels, e.g. a chalk colour. Identity by default. */
  styleDecision?: (text: string) => string;
  styleLeaf?: (text: string) => string;
}

function labelOf(node: TreeNode, options: RenderOptions): string {
  if (node.kind === 'leaf') {
    const text = formatActionLabel(node.action);
    return options.styleLeaf ? options.styleLeaf(text) : text;
  }
  const text = formatPredicate(node.predicate);
  return options.styleDecision ? options.styleDecision(text) : text;
}

/**
 * One node per line, `true` branch first:
 *
 *     x <= 5
 *     ├─ [true] action: a0
 *     └─ [false] action: a1
 */
export function renderTree(tree: DecisionTree, options: RenderOptions = {}, startId: NodeId = tree.rootId): string {
  const lines: string[] = [labelOf(tree.requireNode(startId), options)];

  const walk = (id: NodeId, prefix: string): void => {
    const node = tree.requireNode(id);
    if (node.kind === 'leaf') return;
    BRANCH_ORDER.forEach((branch, idx) => {
      const isLast = idx === BRANCH_ORDER.length - 1;
      const child = tree.requireNode(node.branches[branch]);
      const connector = isLast ? TREE_CHARS.lastBranch : TREE_CHARS.branch;
      lines.push(`${prefix}${connector} [${branch}] ${labelOf(child, options)}`);
      walk(child.id, prefix + (isLast ? TREE_CHARS.space : TREE_CHARS.vertical));
    });
  };

  walk(startId, '');
  return lines.join('\n');
}
