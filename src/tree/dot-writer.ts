// Canonical DOT serialisation of a decision tree

import type { DecisionTree } from './decision-tree.js';
import { formatActionLabel } from './label-grammar.js';
import { BRANCH_ORDER, formatPredicate, type NodeId } from './types.js';

export interface DotWriteOptions {
  graphName?: string;
}

function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Serialise `tree` as DOT that parseTreeGraph reads back to an isomorphic
 * tree. Node ids are `n0, n1, …` in pre-order, so equal trees always
 * produce identical text.
 */
export function toDot(tree: DecisionTree, options: DotWriteOptions = {}): string {
  const names = new Map<NodeId, string>();
  for (const node of tree.traverse()) {
    names.set(node.id, `n${names.size}`);
  }
  const nameOf = (id: NodeId): string => names.get(id) ?? `n${id}`;

  const lines: string[] = [`digraph ${options.graphName ?? 'tree'} {`];
  for (const node of tree.traverse()) {
    const name = nameOf(node.id);
    if (node.kind === 'leaf') {
      lines.push(`  ${name} [label=${quote(formatActionLabel(node.action))}, shape=ellipse];`);
      continue;
    }
    lines.push(`  ${name} [label=${quote(formatPredicate(node.predicate))}, shape=box];`);
    for (const branch of BRANCH_ORDER) {
      lines.push(`  ${name} -> ${nameOf(node.branches[branch])} [label="${branch}"];`);
    }
  }
  lines.push('}');
  return lines.join('\n') + '\n';
}
