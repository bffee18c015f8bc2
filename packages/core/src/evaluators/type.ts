import { jsonTypeOf, type Instance, type JsonType } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure, readKeyword } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

export function matchesType(instance: Instance, expected: string): boolean {
  const actual: JsonType = jsonTypeOf(instance);
  return actual === expected || (actual === 'integer' && expected === 'number');
}

export const typeEvaluator: ConstraintEvaluator = {
  name: 'type',
  keywords: ['type', 'nullable'],

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const type = readKeyword(node, 'type', scope);
    if (type === undefined) return [];
    const expected = (Array.isArray(type) ? type : [type]).filter(
      (entry): entry is string => typeof entry === 'string'
    );

    if (expected.some((entry) => matchesType(instance, entry))) return [];
    if (
      instance === null &&
      scope.ctx.profile.nullable &&
      readKeyword(node, 'nullable', scope) === true
    ) {
      return [];
    }

    const actual = jsonTypeOf(instance);
    return [
      failure(
        scope,
        'type',
        'type',
        `Expected ${expected.join(' or ')}, got ${actual}`,
        { expected, actual }
      ),
    ];
  },
};
