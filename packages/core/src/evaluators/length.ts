import {
  codePointLength,
  isJsonObject,
  type Instance,
} from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureKind, FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import {
  failure,
  invalidKeyword,
  isNonNegativeInteger,
  ownedKeywords,
} from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = ['minLength', 'maxLength', 'minProperties', 'maxProperties'];

const RULES: Record<
  string,
  { kind: FailureKind; applies: 'string' | 'object'; min: boolean; unit: string }
> = {
  minLength: { kind: 'min-length', applies: 'string', min: true, unit: 'characters' },
  maxLength: { kind: 'max-length', applies: 'string', min: false, unit: 'characters' },
  minProperties: { kind: 'min-properties', applies: 'object', min: true, unit: 'properties' },
  maxProperties: { kind: 'max-properties', applies: 'object', min: false, unit: 'properties' },
};

function sizeOf(instance: Instance, applies: 'string' | 'object'): number | undefined {
  if (applies === 'string') {
    return typeof instance === 'string' ? codePointLength(instance) : undefined;
  }
  return isJsonObject(instance) ? Object.keys(instance).length : undefined;
}

/** String lengths count code points; object sizes count own keys. */
export const lengthEvaluator: ConstraintEvaluator = {
  name: 'length',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const failures: FailureRecord[] = [];
    for (const [keyword, limit] of ownedKeywords(node, KEYWORDS, scope)) {
      const rule = RULES[keyword];
      if (!rule) continue;
      const size = sizeOf(instance, rule.applies);
      if (size === undefined) continue;
      if (!isNonNegativeInteger(limit)) {
        failures.push(
          invalidKeyword(scope, keyword, 'must be a non-negative integer')
        );
        continue;
      }
      if (rule.min ? size < limit : size > limit) {
        failures.push(
          failure(
            scope,
            keyword,
            rule.kind,
            `Must have ${rule.min ? 'at least' : 'at most'} ${limit} ${rule.unit}, got ${size}`,
            { limit, actual: size }
          )
        );
      }
    }
    return failures;
  },
};
