// Node label grammar for tree graphs produced by external tools

import type { ComparisonOperator, Predicate } from './types.js';

export type LabelParseResult =
  | { kind: 'predicate'; predicate: Predicate }
  | { kind: 'action'; action: string }
  | { kind: 'unrecognized'; reason: string };

const OPERATOR_ALIASES: Record<string, ComparisonOperator> = {
  '<=': '<=',
  '≤': '<=',
  '<': '<',
  '>=': '>=',
  '≥': '>=',
  '>': '>',
  '==': '==',
  '=': '==',
  '!=': '!=',
  '≠': '!=',
};

// Longest alternatives first so "<=" never matches as "<".
const PREDICATE_PATTERN =
  /^([A-Za-z_][A-Za-z0-9_.]*)\s*(<=|>=|==|!=|≤|≥|≠|<|>|=)\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)$/;

const TAGGED_ACTION_PATTERN = /^(?:action|choose)\s*:\s*(.*)$/i;

const ACTION_NAME_PATTERN = /^[A-Za-z0-9_.\-]+$/;

export const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/;

/**
 * Parse one node label. Two conventions are understood: inline predicate
 * text (`x <= 5`) and tagged action text (`action: a0`). Anything else is
 * reported as unrecognized; callers decide how to fail.
 */
export function parseLabel(label: string): LabelParseResult {
  const text = label.trim();
  if (text.length === 0) {
    return { kind: 'unrecognized', reason: 'empty label' };
  }

  const tagged = TAGGED_ACTION_PATTERN.exec(text);
  if (tagged) {
    return parseActionList(tagged[1]);
  }

  const predicate = PREDICATE_PATTERN.exec(text);
  if (predicate) {
    const [, variable, rawOperator, rawBound] = predicate;
    const bound = Number(rawBound);
    if (!Number.isFinite(bound)) {
      return { kind: 'unrecognized', reason: `bound "${rawBound}" is not a finite number` };
    }
    return {
      kind: 'predicate',
      predicate: { variable, operator: OPERATOR_ALIASES[rawOperator], bound },
    };
  }

  return { kind: 'unrecognized', reason: `label "${text}" is neither a predicate nor a tagged action` };
}

function parseActionList(body: string): LabelParseResult {
  const names = body.split(',').map((part) => part.trim());
  if (names.length === 0 || names.some((name) => name.length === 0)) {
    return { kind: 'unrecognized', reason: `empty action in "${body}"` };
  }
  const invalid = names.find((name) => !ACTION_NAME_PATTERN.test(name));
  if (invalid !== undefined) {
    return { kind: 'unrecognized', reason: `invalid action name "${invalid}"` };
  }
  return { kind: 'action', action: names.join(',') };
}

/** Label text written back for a leaf. */
export function formatActionLabel(action: string): string {
  return `action: ${action}`;
}
