import type { Instance } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure, invalidKeyword, ownedKeywords } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = ['pattern', 'format'];

function checkPattern(
  source: unknown,
  instance: Instance,
  scope: EvaluationScope
): FailureRecord | undefined {
  if (typeof source !== 'string') {
    return invalidKeyword(scope, 'pattern', 'must be a string');
  }
  if (typeof instance !== 'string') return undefined;

  const compiled = scope.ctx.pattern(source);
  if (compiled instanceof SyntaxError) {
    return invalidKeyword(
      scope,
      'pattern',
      `is not a valid regular expression: ${compiled.message}`
    );
  }
  if (compiled.test(instance)) return undefined;
  return failure(scope, 'pattern', 'pattern', `Must match pattern ${source}`, {
    pattern: source,
  });
}

/** Unknown format names pass, as do instances of a type the format does not check. */
function checkFormat(
  name: unknown,
  instance: Instance,
  scope: EvaluationScope
): FailureRecord | undefined {
  const formats = scope.ctx.formats;
  if (!formats || typeof name !== 'string') return undefined;
  const check = formats.get(name);
  if (!check) return undefined;

  let valid: boolean;
  if (check.type === 'string') {
    if (typeof instance !== 'string') return undefined;
    valid = check.validate(instance);
  } else {
    if (typeof instance !== 'number') return undefined;
    valid = check.validate(instance);
  }
  if (valid) return undefined;
  return failure(scope, 'format', 'format', `Must be a valid ${name}`, {
    format: name,
  });
}

export const patternEvaluator: ConstraintEvaluator = {
  name: 'pattern',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const failures: FailureRecord[] = [];
    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      const result =
        keyword === 'pattern'
          ? checkPattern(value, instance, scope)
          : checkFormat(value, instance, scope);
      if (result) failures.push(result);
    }
    return failures;
  },
};
