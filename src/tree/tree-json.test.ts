import { ParseError } from '../utils/errors.js';
import { buildTree, decide, leaf, scenarioTree } from '../test/helpers.js';
import { fromJSON, toJSON } from './tree-json.js';

describe('tree JSON', () => {
  it('exports the nested form', () => {
    const tree = buildTree(decide('x', '<=', 5, leaf('a0'), leaf('a1')));
    expect(toJSON(tree)).toEqual({
      type: 'decision',
      predicate: { variable: 'x', operator: '<=', bound: 5 },
      children: { true: { type: 'leaf', action: 'a0' }, false: { type: 'leaf', action: 'a1' } },
    });
  });

  it('reads its own output from a value or from text', () => {
    const tree = buildTree(scenarioTree());
    expect(fromJSON(toJSON(tree)).equals(tree)).toBe(true);
    expect(fromJSON(JSON.stringify(toJSON(tree))).equals(tree)).toBe(true);
  });

  it('rejects malformed input with ParseError', () => {
    expect(() => fromJSON('{ not json')).toThrow('tree JSON is not valid JSON');
    expect(() => fromJSON({ type: 'leaf' })).toThrow(ParseError);
    expect(() => fromJSON({ type: 'leaf' })).toThrow('invalid tree JSON');
    expect(() =>
      fromJSON({ type: 'decision', predicate: { variable: 'x', operator: '=>', bound: 1 }, children: { true: leaf('a0'), false: leaf('a1') } })
    ).toThrow('invalid tree JSON');
  });

  it('checks leaf actions against the action set', () => {
    expect(() => fromJSON(scenarioTree(), { actions: ['a0'] })).toThrow(ParseError);
  });
});
