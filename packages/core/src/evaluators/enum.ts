import type { Instance } from '../document/json.js';
import { deepEqual } from '../document/equality.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure, invalidKeyword, ownedKeywords, show } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = ['enum', 'const'];

export const enumEvaluator: ConstraintEvaluator = {
  name: 'enum',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const failures: FailureRecord[] = [];
    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      if (keyword === 'const') {
        if (!deepEqual(instance, value)) {
          failures.push(
            failure(scope, 'const', 'const', `Value must equal ${show(value)}`, {
              expected: value,
            })
          );
        }
        continue;
      }

      if (!Array.isArray(value)) {
        failures.push(invalidKeyword(scope, 'enum', 'must be an array'));
        continue;
      }
      if (!value.some((candidate) => deepEqual(instance, candidate))) {
        failures.push(
          failure(
            scope,
            'enum',
            'enum',
            `Value must be one of ${value.map(show).join(', ')}`,
            { allowed: value }
          )
        );
      }
    }
    return failures;
  },
};
