import type { Instance } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import {
  evaluateChild,
  failure,
  invalidKeyword,
  ownedKeywords,
} from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = ['allOf', 'anyOf', 'oneOf', 'not'];

interface Attempt {
  readonly index: number;
  readonly failures: FailureRecord[];
}

function attempt(
  node: SchemaNode,
  keyword: string,
  count: number,
  instance: Instance,
  scope: EvaluationScope,
  stopOnMatch: boolean
): Attempt[] {
  const attempts: Attempt[] = [];
  for (let index = 0; index < count; index++) {
    const failures = evaluateChild(node, [keyword, index], instance, scope);
    attempts.push({ index, failures });
    if (stopOnMatch && failures.length === 0) break;
  }
  return attempts;
}

/** Fewest failures wins; the first declared alternative breaks ties. */
function closest(attempts: readonly Attempt[]): Attempt | undefined {
  let best: Attempt | undefined;
  for (const candidate of attempts) {
    if (!best || candidate.failures.length < best.failures.length) {
      best = candidate;
    }
  }
  return best;
}

function summary(attempts: readonly Attempt[]) {
  return attempts.map(({ index, failures }) => ({
    index,
    failures: failures.length,
  }));
}

function anyOf(
  node: SchemaNode,
  count: number,
  instance: Instance,
  scope: EvaluationScope
): FailureRecord[] {
  const attempts = attempt(node, 'anyOf', count, instance, scope, true);
  if (attempts.some(({ failures }) => failures.length === 0)) return [];

  const best = closest(attempts);
  return [
    failure(
      scope,
      'anyOf',
      'any-of',
      `Must match at least one of ${count} alternatives`,
      {
        tried: attempts.length,
        closest: best?.index ?? null,
        alternatives: summary(attempts),
      },
      { causes: best?.failures ?? [] }
    ),
  ];
}

function oneOf(
  node: SchemaNode,
  count: number,
  instance: Instance,
  scope: EvaluationScope
): FailureRecord[] {
  const attempts = attempt(node, 'oneOf', count, instance, scope, false);
  const matched = attempts
    .filter(({ failures }) => failures.length === 0)
    .map(({ index }) => index);
  if (matched.length === 1) return [];

  if (matched.length > 1) {
    return [
      failure(
        scope,
        'oneOf',
        'one-of',
        `Must match exactly one of ${count} alternatives, matched ${matched.length}`,
        { tried: attempts.length, matched, alternatives: summary(attempts) }
      ),
    ];
  }

  const best = closest(attempts);
  return [
    failure(
      scope,
      'oneOf',
      'one-of',
      `Must match exactly one of ${count} alternatives, matched none`,
      {
        tried: attempts.length,
        matched,
        closest: best?.index ?? null,
        alternatives: summary(attempts),
      },
      { causes: best?.failures ?? [] }
    ),
  ];
}

function not(
  node: SchemaNode,
  instance: Instance,
  scope: EvaluationScope
): FailureRecord[] {
  const failures = evaluateChild(node, ['not'], instance, scope);
  // structural failures inside `not` pass through unchanged
  const structural = failures.filter(({ category }) => category === 'structural');
  if (structural.length > 0) return structural;
  if (failures.length > 0) return [];
  return [failure(scope, 'not', 'not', 'Must not match the schema in "not"')];
}

export const compositeEvaluator: ConstraintEvaluator = {
  name: 'composite',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const failures: FailureRecord[] = [];
    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      if (keyword === 'not') {
        failures.push(...not(node, instance, scope));
        continue;
      }
      if (!Array.isArray(value)) {
        failures.push(invalidKeyword(scope, keyword, 'must be an array'));
        continue;
      }
      if (keyword === 'allOf') {
        for (let index = 0; index < value.length; index++) {
          failures.push(
            ...evaluateChild(node, ['allOf', index], instance, scope)
          );
        }
      } else if (keyword === 'anyOf') {
        failures.push(...anyOf(node, value.length, instance, scope));
      } else {
        failures.push(...oneOf(node, value.length, instance, scope));
      }
    }
    return failures;
  },
};
