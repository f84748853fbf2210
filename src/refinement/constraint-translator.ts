// Path condition to state-space restriction

import { VARIABLE_NAME_PATTERN } from '../tree/label-grammar.js';
import { COMPARISON_OPERATORS, type ComparisonOperator } from '../tree/types.js';
import { UnsupportedPredicateError } from '../utils/errors.js';
import type { PathCondition, PathElement, StateRestriction } from './types.js';

export interface TranslatorOptions {
  /** State variables the re-synthesizer knows. Any identifier when omitted. */
  variables?: Iterable<string>;
  operators?: readonly ComparisonOperator[];
}

export const EMPTY_RESTRICTION_EXPRESSION = 'true';

function formatClause(element: PathElement): string {
  return `${element.variable}${element.operator}${element.bound}`;
}

/**
 * One clause per path element, in order, operators unchanged. Complements
 * on `false` branches are already strict in the path condition.
 */
export function translatePathCondition(pathCondition: PathCondition, options: TranslatorOptions = {}): StateRestriction {
  const variables = options.variables ? new Set(options.variables) : undefined;
  const operators = options.operators ?? COMPARISON_OPERATORS;

  const clauses = pathCondition.map((element) => {
    if (!VARIABLE_NAME_PATTERN.test(element.variable)) {
      throw new UnsupportedPredicateError(`"${element.variable}" is not a variable name`);
    }
    if (variables && !variables.has(element.variable)) {
      throw new UnsupportedPredicateError(`unknown variable "${element.variable}"`);
    }
    if (!operators.includes(element.operator)) {
      throw new UnsupportedPredicateError(`operator "${element.operator}" is not supported`);
    }
    if (!Number.isFinite(element.bound)) {
      throw new UnsupportedPredicateError(`bound of "${element.variable}" is not a finite number`);
    }
    return { ...element };
  });

  return {
    clauses,
    expression: clauses.length === 0 ? EMPTY_RESTRICTION_EXPRESSION : clauses.map(formatClause).join(' & '),
  };
}
