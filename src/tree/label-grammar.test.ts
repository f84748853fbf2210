import { formatActionLabel, parseLabel } from './label-grammar.js';

describe('parseLabel', () => {
  it('parses inline predicates', () => {
    expect(parseLabel('x <= 5')).toEqual({ kind: 'predicate', predicate: { variable: 'x', operator: '<=', bound: 5 } });
    expect(parseLabel('speed > -0.5')).toEqual({
      kind: 'predicate',
      predicate: { variable: 'speed', operator: '>', bound: -0.5 },
    });
    expect(parseLabel('var_3 == 2')).toEqual({ kind: 'predicate', predicate: { variable: 'var_3', operator: '==', bound: 2 } });
  });

  it('maps unicode and single "=" operators', () => {
    expect(parseLabel('x≤5')).toEqual({ kind: 'predicate', predicate: { variable: 'x', operator: '<=', bound: 5 } });
    expect(parseLabel('y ≥ 1.5')).toEqual({ kind: 'predicate', predicate: { variable: 'y', operator: '>=', bound: 1.5 } });
    expect(parseLabel('z ≠ 0')).toEqual({ kind: 'predicate', predicate: { variable: 'z', operator: '!=', bound: 0 } });
    expect(parseLabel('z = 3')).toEqual({ kind: 'predicate', predicate: { variable: 'z', operator: '==', bound: 3 } });
  });

  it('keeps "<=" from matching as "<"', () => {
    const result = parseLabel('a<=1');
    expect(result).toEqual({ kind: 'predicate', predicate: { variable: 'a', operator: '<=', bound: 1 } });
  });

  it('parses tagged actions case-insensitively', () => {
    expect(parseLabel('action: a0')).toEqual({ kind: 'action', action: 'a0' });
    expect(parseLabel('Action:a1')).toEqual({ kind: 'action', action: 'a1' });
    expect(parseLabel('choose: left')).toEqual({ kind: 'action', action: 'left' });
  });

  it('joins an action list into one identifier', () => {
    expect(parseLabel('action: a0, a1')).toEqual({ kind: 'action', action: 'a0,a1' });
  });

  it('fails closed on anything else', () => {
    expect(parseLabel('').kind).toBe('unrecognized');
    expect(parseLabel('a0').kind).toBe('unrecognized');
    expect(parseLabel('x <= y').kind).toBe('unrecognized');
    expect(parseLabel('action:').kind).toBe('unrecognized');
    expect(parseLabel('action: a0,,a1').kind).toBe('unrecognized');
    expect(parseLabel('2 < x').kind).toBe('unrecognized');
  });

  it('formats leaf labels back in tagged form', () => {
    expect(formatActionLabel('a0')).toBe('action: a0');
    expect(parseLabel(formatActionLabel('a0'))).toEqual({ kind: 'action', action: 'a0' });
  });
});
