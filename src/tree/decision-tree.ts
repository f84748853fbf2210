// Decision tree model - arena of nodes owned by one tree instance

import { TreeStructureError } from '../utils/errors.js';
import {
  BRANCH_ORDER,
  type BranchLabel,
  type DecisionNode,
  type NodeId,
  type Predicate,
  type TreeNode,
  type TreeSpec,
  type TreeStats,
  type TreeValidationIssue,
} from './types.js';

export interface TreeOptions {
  /** Finite action set leaves must draw from. Unchecked when omitted. */
  actions?: Iterable<string>;
}

export interface SpliceResult {
  /** Id, in the receiving tree, of the root of the inserted copy. */
  newRootId: NodeId;
  /** The sub-tree that was cut out, as an independent tree keeping its ids. */
  detached: DecisionTree;
}

export interface ChildRef {
  branch: BranchLabel;
  node: TreeNode;
}

/**
 * Collects nodes bottom-up and hands them to a DecisionTree. Each node may
 * be used as a child once; depths are assigned when the tree is built.
 */
export class TreeBuilder {
  private readonly nodes = new Map<NodeId, TreeNode>();
  private readonly claimed = new Set<NodeId>();
  private nextId = 0;

  leaf(action: string, sourceId?: string): NodeId {
    const id = this.nextId++;
    this.nodes.set(id, { kind: 'leaf', id, depth: 0, action, sourceId });
    return id;
  }

  decision(predicate: Predicate, branches: Record<BranchLabel, NodeId>, sourceId?: string): NodeId {
    if (branches.true === branches.false) {
      throw new TreeStructureError(`both branches point at node ${branches.true}`);
    }
    for (const branch of BRANCH_ORDER) {
      const childId = branches[branch];
      if (!this.nodes.has(childId)) {
        throw new TreeStructureError(`branch "${branch}" refers to unknown node ${childId}`);
      }
      if (this.claimed.has(childId)) {
        throw new TreeStructureError(`node ${childId} already has a parent`);
      }
    }
    for (const branch of BRANCH_ORDER) {
      this.claimed.add(branches[branch]);
    }
    const id = this.nextId++;
    this.nodes.set(id, {
      kind: 'decision',
      id,
      depth: 0,
      predicate: { ...predicate },
      branches: { true: branches.true, false: branches.false },
      sourceId,
    });
    return id;
  }

  build(rootId: NodeId, options: TreeOptions = {}): DecisionTree {
    if (!this.nodes.has(rootId)) {
      throw new TreeStructureError(`root ${rootId} was never added`);
    }
    if (this.claimed.has(rootId)) {
      throw new TreeStructureError(`root ${rootId} has a parent`);
    }

    const placed = new Map<NodeId, TreeNode>();
    const stack: Array<[NodeId, number]> = [[rootId, 0]];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const [id, depth] = entry;
      const node = this.nodes.get(id);
      if (!node) {
        throw new TreeStructureError(`missing node ${id}`);
      }
      placed.set(id, { ...node, depth });
      if (node.kind === 'decision') {
        for (const branch of BRANCH_ORDER) {
          stack.push([node.branches[branch], depth + 1]);
        }
      }
    }

    if (placed.size !== this.nodes.size) {
      throw new TreeStructureError(`${this.nodes.size - placed.size} node(s) are not reachable from the root`);
    }

    return DecisionTree.adopt(placed, rootId, this.nextId, options.actions);
  }
}

/**
 * A rooted decision tree. The tree exclusively owns its nodes; sub-trees
 * handed out are always copies. `replaceSubtree` is the only mutator.
 */
export class DecisionTree {
  private nodes: Map<NodeId, TreeNode>;
  private rootNodeId: NodeId;
  private nextId: number;
  readonly actions?: ReadonlySet<string>;

  private constructor(nodes: Map<NodeId, TreeNode>, rootId: NodeId, nextId: number, actions?: Iterable<string>) {
    this.nodes = nodes;
    this.rootNodeId = rootId;
    this.nextId = nextId;
    this.actions = actions ? new Set(actions) : undefined;

    if (this.actions) {
      for (const node of this.nodes.values()) {
        if (node.kind === 'leaf' && !this.actions.has(node.action)) {
          throw new TreeStructureError(`action "${node.action}" is not in the known action set`);
        }
      }
    }
  }

  /** @internal used by TreeBuilder */
  static adopt(nodes: Map<NodeId, TreeNode>, rootId: NodeId, nextId: number, actions?: Iterable<string>): DecisionTree {
    return new DecisionTree(nodes, rootId, nextId, actions);
  }

  static fromSpec(spec: TreeSpec, options: TreeOptions = {}): DecisionTree {
    const builder = new TreeBuilder();
    const add = (node: TreeSpec): NodeId => {
      if (node.type === 'leaf') {
        return builder.leaf(node.action);
      }
      const trueId = add(node.children.true);
      const falseId = add(node.children.false);
      return builder.decision(node.predicate, { true: trueId, false: falseId });
    };
    return builder.build(add(spec), options);
  }

  get rootId(): NodeId {
    return this.rootNodeId;
  }

  get root(): TreeNode {
    return this.requireNode(this.rootNodeId);
  }

  /** Number of nodes in the arena. */
  get size(): number {
    return this.nodes.size;
  }

  getNode(id: NodeId): TreeNode | undefined {
    return this.nodes.get(id);
  }

  requireNode(id: NodeId): TreeNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new TreeStructureError(`node ${id} does not exist`);
    }
    return node;
  }

  children(id: NodeId): ChildRef[] {
    const node = this.requireNode(id);
    if (node.kind === 'leaf') return [];
    return BRANCH_ORDER.map((branch) => ({ branch, node: this.requireNode(node.branches[branch]) }));
  }

  /**
   * Pre-order walk, `true` branch before `false`.
   */
  *traverse(startId: NodeId = this.rootNodeId): Generator<TreeNode> {
    const stack: NodeId[] = [startId];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.requireNode(id);
      yield node;
      if (node.kind === 'decision') {
        // Reverse push so `true` pops first.
        for (let i = BRANCH_ORDER.length - 1; i >= 0; i--) {
          stack.push(node.branches[BRANCH_ORDER[i]]);
        }
      }
    }
  }

  stats(): TreeStats {
    return this.subtreeStats(this.rootNodeId);
  }

  subtreeStats(id: NodeId): TreeStats {
    const base = this.requireNode(id).depth;
    let decisionNodes = 0;
    let leaves = 0;
    let maxDepth = base;
    for (const node of this.traverse(id)) {
      if (node.kind === 'decision') {
        decisionNodes++;
      } else {
        leaves++;
        maxDepth = Math.max(maxDepth, node.depth);
      }
    }
    const depth = maxDepth - base;
    return { decisionNodes, leaves, totalNodes: decisionNodes + leaves, depth };
  }

  /**
   * Deep copy of the sub-tree rooted at `id` as an independent tree with
   * fresh ids and depths re-based at 0.
   */
  copySubtree(id: NodeId = this.rootNodeId): DecisionTree {
    const nodes = new Map<NodeId, TreeNode>();
    const copiedRoot = this.copyInto(nodes, id, 0, { next: 0 });
    return new DecisionTree(nodes, copiedRoot.id, nodes.size, this.actions);
  }

  /**
   * Copy that keeps every node id, for snapshots of the whole tree.
   */
  clone(): DecisionTree {
    const nodes = new Map<NodeId, TreeNode>();
    for (const [id, node] of this.nodes) {
      nodes.set(id, node.kind === 'decision'
        ? { ...node, predicate: { ...node.predicate }, branches: { ...node.branches } }
        : { ...node });
    }
    return new DecisionTree(nodes, this.rootNodeId, this.nextId, this.actions);
  }

  toSpec(id: NodeId = this.rootNodeId): TreeSpec {
    const node = this.requireNode(id);
    if (node.kind === 'leaf') {
      return { type: 'leaf', action: node.action };
    }
    return {
      type: 'decision',
      predicate: { ...node.predicate },
      children: {
        true: this.toSpec(node.branches.true),
        false: this.toSpec(node.branches.false),
      },
    };
  }

  /**
   * Resolve a node-id path (root first). Every consecutive pair must be a
   * parent and one of its children.
   */
  locate(path: readonly NodeId[]): TreeNode | undefined {
    if (path.length === 0 || path[0] !== this.rootNodeId) return undefined;
    let current = this.nodes.get(path[0]);
    for (let i = 1; i < path.length; i++) {
      if (!current || current.kind === 'leaf') return undefined;
      const branches = current.branches;
      const wanted = path[i];
      if (!BRANCH_ORDER.some((b) => branches[b] === wanted)) return undefined;
      current = this.nodes.get(wanted);
    }
    return current;
  }

  /**
   * Splice: put a copy of `replacement` where the last id of `path` sits.
   * Navigation follows the path from the root to the target's parent and
   * only that parent's branch reference changes.
   */
  replaceSubtree(path: readonly NodeId[], replacement: DecisionTree): SpliceResult {
    if (path.length === 0) {
      throw new TreeStructureError('cannot splice at an empty path');
    }
    if (path[0] !== this.rootNodeId) {
      throw new TreeStructureError(`path starts at ${path[0]}, root is ${this.rootNodeId}`);
    }
    this.assertActionsKnown(replacement);

    const targetId = path[path.length - 1];

    if (path.length === 1) {
      const detached = this.detach(this.rootNodeId);
      const inserted = this.importSubtree(replacement, replacement.rootId, 0);
      this.rootNodeId = inserted;
      return { newRootId: inserted, detached };
    }

    let parent: DecisionNode | undefined;
    let branch: BranchLabel | undefined;
    let current: TreeNode = this.requireNode(path[0]);
    for (let i = 1; i < path.length; i++) {
      if (current.kind === 'leaf') {
        throw new TreeStructureError(`path passes through leaf ${current.id}`);
      }
      const decision: DecisionNode = current;
      const next = BRANCH_ORDER.find((b) => decision.branches[b] === path[i]);
      if (next === undefined) {
        throw new TreeStructureError(`node ${path[i]} is not a child of ${decision.id}`);
      }
      parent = decision;
      branch = next;
      current = this.requireNode(path[i]);
    }
    if (!parent || branch === undefined) {
      throw new TreeStructureError(`no parent found for node ${targetId}`);
    }

    const target = this.requireNode(targetId);
    const detached = this.detach(targetId);

    const newRootId = this.importSubtree(replacement, replacement.rootId, target.depth);
    this.nodes.set(parent.id, { ...parent, branches: { ...parent.branches, [branch]: newRootId } });

    return { newRootId, detached };
  }

  /**
   * Reverse a splice made at `path`. The inserted copy is dropped and the
   * detached nodes come back under their original ids, so node-id paths
   * taken before the splice resolve again.
   */
  undoSplice(path: readonly NodeId[], splice: SpliceResult): void {
    const insertedPath = [...path.slice(0, -1), splice.newRootId];
    const inserted = this.locate(insertedPath);
    if (!inserted) {
      throw new TreeStructureError(`spliced node ${splice.newRootId} is no longer at the given path`);
    }

    for (const node of Array.from(this.traverse(inserted.id))) {
      this.nodes.delete(node.id);
    }
    for (const node of splice.detached.traverse()) {
      if (this.nodes.has(node.id)) {
        throw new TreeStructureError(`node id ${node.id} is already in use`);
      }
      this.nodes.set(node.id, { ...node, depth: node.depth + inserted.depth });
    }

    if (path.length === 1) {
      this.rootNodeId = splice.detached.rootId;
      return;
    }
    const parent = this.requireNode(path[path.length - 2]);
    if (parent.kind === 'leaf') {
      throw new TreeStructureError(`node ${parent.id} is a leaf`);
    }
    const branch = BRANCH_ORDER.find((b) => parent.branches[b] === inserted.id);
    if (branch === undefined) {
      throw new TreeStructureError(`node ${inserted.id} is not a child of ${parent.id}`);
    }
    this.nodes.set(parent.id, { ...parent, branches: { ...parent.branches, [branch]: splice.detached.rootId } });
  }

  /**
   * Structural invariants: every reference resolves, every decision node has
   * both branches, leaves carry a known action, each node is reached exactly
   * once from the root and depths agree with the walk.
   */
  validate(): TreeValidationIssue[] {
    const issues: TreeValidationIssue[] = [];
    const visited = new Set<NodeId>();
    const stack: Array<[NodeId, number, NodeId | undefined]> = [[this.rootNodeId, 0, undefined]];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const [id, depth, parentId] = entry;
      const node = this.nodes.get(id);
      if (!node) {
        issues.push({ code: 'missing_node', nodeId: parentId ?? id, message: `reference to missing node ${id}` });
        continue;
      }
      if (visited.has(id)) {
        issues.push({ code: 'shared_node', nodeId: id, message: `node ${id} is reached more than once` });
        continue;
      }
      visited.add(id);
      if (node.depth !== depth) {
        issues.push({ code: 'depth_mismatch', nodeId: id, message: `node ${id} has depth ${node.depth}, expected ${depth}` });
      }

      if (node.kind === 'leaf') {
        if (node.action.trim().length === 0) {
          issues.push({ code: 'empty_action', nodeId: id, message: `leaf ${id} has no action` });
        } else if (this.actions && !this.actions.has(node.action)) {
          issues.push({ code: 'unknown_action', nodeId: id, message: `leaf ${id} has unknown action "${node.action}"` });
        }
        continue;
      }

      for (const branch of BRANCH_ORDER) {
        const childId: NodeId | undefined = node.branches[branch];
        if (childId === undefined) {
          issues.push({ code: 'missing_branch', nodeId: id, message: `decision node ${id} has no "${branch}" branch` });
        } else {
          stack.push([childId, depth + 1, id]);
        }
      }
    }

    for (const id of this.nodes.keys()) {
      if (!visited.has(id)) {
        issues.push({ code: 'unreachable_node', nodeId: id, message: `node ${id} is not reachable from the root` });
      }
    }

    return issues;
  }

  /**
   * Isomorphism: same predicates, same actions, same shape. Ids are ignored.
   */
  equals(other: DecisionTree, id: NodeId = this.rootNodeId, otherId: NodeId = other.rootId): boolean {
    const a = this.requireNode(id);
    const b = other.requireNode(otherId);
    if (a.kind === 'leaf' || b.kind === 'leaf') {
      return a.kind === 'leaf' && b.kind === 'leaf' && a.action === b.action;
    }
    if (
      a.predicate.variable !== b.predicate.variable ||
      a.predicate.operator !== b.predicate.operator ||
      a.predicate.bound !== b.predicate.bound
    ) {
      return false;
    }
    return BRANCH_ORDER.every((branch) => this.equals(other, a.branches[branch], b.branches[branch]));
  }

  private assertActionsKnown(replacement: DecisionTree): void {
    if (!this.actions) return;
    for (const node of replacement.traverse()) {
      if (node.kind === 'leaf' && !this.actions.has(node.action)) {
        throw new TreeStructureError(`replacement uses unknown action "${node.action}"`);
      }
    }
  }

  /** Remove the sub-tree at `id`; it keeps its ids, depths re-based at 0. */
  private detach(id: NodeId): DecisionTree {
    const base = this.requireNode(id).depth;
    const removed = new Map<NodeId, TreeNode>();
    for (const node of Array.from(this.traverse(id))) {
      removed.set(node.id, { ...node, depth: node.depth - base });
      this.nodes.delete(node.id);
    }
    return new DecisionTree(removed, id, this.nextId, this.actions);
  }

  private importSubtree(source: DecisionTree, sourceId: NodeId, depth: number): NodeId {
    const counter = { next: this.nextId };
    const inserted = source.copyInto(this.nodes, sourceId, depth, counter);
    this.nextId = counter.next;
    return inserted.id;
  }

  private copyInto(target: Map<NodeId, TreeNode>, id: NodeId, depth: number, counter: { next: number }): TreeNode {
    const node = this.requireNode(id);
    const newId = counter.next++;
    let copy: TreeNode;
    if (node.kind === 'leaf') {
      copy = { kind: 'leaf', id: newId, depth, action: node.action, sourceId: node.sourceId };
    } else {
      const trueChild = this.copyInto(target, node.branches.true, depth + 1, counter);
      const falseChild = this.copyInto(target, node.branches.false, depth + 1, counter);
      copy = {
        kind: 'decision',
        id: newId,
        depth,
        predicate: { ...node.predicate },
        branches: { true: trueChild.id, false: falseChild.id },
        sourceId: node.sourceId,
      };
    }
    target.set(newId, copy);
    return copy;
  }
}
