import type { Instance } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { evaluateChild, matchesChild, readKeyword } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

/** `then`/`else` without `if` do nothing; `if` failures are never reported. */
export const conditionalEvaluator: ConstraintEvaluator = {
  name: 'conditional',
  keywords: ['if', 'then', 'else'],

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    if (readKeyword(node, 'if', scope) === undefined) return [];
    const branch = matchesChild(node, ['if'], instance, scope) ? 'then' : 'else';
    if (readKeyword(node, branch, scope) === undefined) return [];
    return evaluateChild(node, [branch], instance, scope);
  },
};
