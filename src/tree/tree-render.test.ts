import { buildTree, leaf, scenarioTree } from '../test/helpers.js';
import { renderTree } from './tree-render.js';

describe('renderTree', () => {
  it('draws one node per line with branch connectors', () => {
    expect(renderTree(buildTree(scenarioTree()))).toBe(
      [
        'x <= 5',
        '├─ [true] y > 3',
        '│  ├─ [true] z <= 1',
        '│  │  ├─ [true] action: a0',
        '│  │  └─ [false] action: a1',
        '│  └─ [false] action: a2',
        '└─ [false] action: a3',
      ].join('\n')
    );
  });

  it('applies label styles', () => {
    const text = renderTree(buildTree(scenarioTree()), { styleDecision: (s) => `<${s}>`, styleLeaf: (s) => s.toUpperCase() }, 4);
    expect(text.split('\n')).toEqual([
      '<y > 3>',
      '├─ [true] <z <= 1>',
      '│  ├─ [true] ACTION: A0',
      '│  └─ [false] ACTION: A1',
      '└─ [false] ACTION: A2',
    ]);
  });

  it('renders a lone leaf', () => {
    expect(renderTree(buildTree(leaf('a0')))).toBe('action: a0');
  });
});
