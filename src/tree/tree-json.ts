// JSON form of a decision tree

import { z } from 'zod';
import { ParseError, TreeStructureError } from '../utils/errors.js';
import { formatZodIssues } from '../utils/config.js';
import { DecisionTree, type TreeOptions } from './decision-tree.js';
import { COMPARISON_OPERATORS, type ComparisonOperator, type TreeSpec } from './types.js';

const OperatorSchema = z.custom<ComparisonOperator>(
  (value) => typeof value === 'string' && COMPARISON_OPERATORS.some((op) => op === value),
  { message: `operator must be one of ${COMPARISON_OPERATORS.join(' ')}` }
);

const PredicateSchema = z.object({
  variable: z.string().min(1),
  operator: OperatorSchema,
  bound: z.number().finite(),
});

const TreeSpecSchema: z.ZodType<TreeSpec> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('leaf'), action: z.string().min(1) }),
    z.object({
      type: z.literal('decision'),
      predicate: PredicateSchema,
      children: z.object({ true: TreeSpecSchema, false: TreeSpecSchema }),
    }),
  ])
);

export function toJSON(tree: DecisionTree): TreeSpec {
  return tree.toSpec();
}

/**
 * Rebuild a tree from its JSON form. Accepts either the parsed value or
 * the JSON text.
 */
export function fromJSON(value: unknown, options: TreeOptions = {}): DecisionTree {
  let raw = value;
  if (typeof value === 'string') {
    try {
      raw = JSON.parse(value);
    } catch (error) {
      throw new ParseError(`tree JSON is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const result = TreeSpecSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(`invalid tree JSON:\n${formatZodIssues(result.error).join('\n')}`);
  }
  try {
    return DecisionTree.fromSpec(result.data, options);
  } catch (error) {
    if (error instanceof TreeStructureError) {
      throw new ParseError(error.message);
    }
    throw error;
  }
}
