import { buildTree, decide, leaf, scenarioTree } from '../test/helpers.js';
import { formatPathCondition, isPathPrefix, selectSubProblems } from './selector.js';

// x<=5 ? a0 : (y>3 ? (z<=1 ? (w<2 ? a1 : a2) : a3) : a4)
// fromSpec ids: a0=0 a1=1 a2=2 w=3 a3=4 z=5 a4=6 y=7 x=8
function nestedTree() {
  return buildTree(
    decide('x', '<=', 5, leaf('a0'), decide('y', '>', 3, decide('z', '<=', 1, decide('w', '<', 2, leaf('a1'), leaf('a2')), leaf('a3')), leaf('a4')))
  );
}

describe('selectSubProblems', () => {
  it('leaves out sub-trees lower than the default minimum height', () => {
    // the y > 3 sub-tree is two edges high, the default minimum is three
    expect(selectSubProblems(buildTree(scenarioTree()), { maxRootDepth: 4 })).toEqual([]);
  });

  it('finds the one qualifying sub-tree of the scenario tree', () => {
    const candidates = selectSubProblems(buildTree(scenarioTree()), { maxRootDepth: 4, minSubtreeDepth: 2 });
    expect(candidates).toEqual([
      {
        rootId: 4,
        treePath: [6, 4],
        pathCondition: [{ variable: 'x', operator: '<=', bound: 5 }],
        depth: 2,
        nodeCount: 2,
        rootDepth: 1,
      },
    ]);
  });

  it('returns nothing when no sub-tree is large enough', () => {
    const small = buildTree(decide('x', '<=', 5, leaf('a0'), leaf('a1')));
    expect(selectSubProblems(small, { maxRootDepth: 4, minSubtreeDepth: 1, minNodeCount: 1 })).toEqual([]);
    expect(selectSubProblems(buildTree(leaf('a0')), { maxRootDepth: 4, includeRoot: true })).toEqual([]);
  });

  it('only roots candidates above maxRootDepth', () => {
    expect(selectSubProblems(buildTree(scenarioTree()), { maxRootDepth: 1, minSubtreeDepth: 2 })).toEqual([]);
  });

  it('offers the root only when asked', () => {
    const candidates = selectSubProblems(buildTree(scenarioTree()), { maxRootDepth: 4, minSubtreeDepth: 2, includeRoot: true });
    expect(candidates.map((c) => [c.rootId, c.depth, c.nodeCount])).toEqual([
      [6, 3, 3],
      [4, 2, 2],
    ]);
    expect(candidates[0].pathCondition).toEqual([]);
    expect(candidates[0].treePath).toEqual([6]);
  });

  it('emits nested candidates with complemented false-branch tests', () => {
    const candidates = selectSubProblems(nestedTree(), { maxRootDepth: 10, minSubtreeDepth: 1, minNodeCount: 1 });
    expect(candidates.map((c) => c.rootId)).toEqual([7, 5, 3]);
    expect(candidates.map((c) => formatPathCondition(c.pathCondition))).toEqual([
      'x>5',
      'x>5 AND y>3',
      'x>5 AND y>3 AND z<=1',
    ]);
    expect(candidates.map((c) => c.treePath)).toEqual([
      [8, 7],
      [8, 7, 5],
      [8, 7, 5, 3],
    ]);
  });

  it('orders by sub-tree depth', () => {
    const tree = nestedTree();
    const options = { maxRootDepth: 10, minSubtreeDepth: 1, minNodeCount: 1 };
    expect(selectSubProblems(tree, { ...options, order: 'deepest-first' }).map((c) => c.depth)).toEqual([3, 2, 1]);
    expect(selectSubProblems(tree, { ...options, order: 'shallowest-first' }).map((c) => c.depth)).toEqual([1, 2, 3]);
  });

  it('keeps pre-order among ties', () => {
    const tree = nestedTree();
    const candidates = selectSubProblems(tree, { maxRootDepth: 10, minSubtreeDepth: 1, minNodeCount: 1, comparator: () => 0 });
    expect(candidates.map((c) => c.rootId)).toEqual([7, 5, 3]);
  });

  it('gives the same answer every time', () => {
    const tree = nestedTree();
    const options = { maxRootDepth: 10, minSubtreeDepth: 1, minNodeCount: 1 };
    expect(selectSubProblems(tree, options)).toEqual(selectSubProblems(tree, options));
  });
});

describe('formatPathCondition', () => {
  it('names the empty path root', () => {
    expect(formatPathCondition([])).toBe('root');
  });
});

describe('isPathPrefix', () => {
  it('matches leading segments only', () => {
    expect(isPathPrefix([8, 7], [8, 7, 5])).toBe(true);
    expect(isPathPrefix([8, 7], [8, 7])).toBe(true);
    expect(isPathPrefix([8, 7, 5], [8, 7])).toBe(false);
    expect(isPathPrefix([8, 5], [8, 7, 5])).toBe(false);
  });
});
