import type { Instance, Json } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureKind, FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure, invalidKeyword, ownedKeywords, readKeyword } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const KEYWORDS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
];

/** Digits after the decimal point, exponent notation included. */
function decimalPlaces(value: number): number {
  const [mantissa = '', exponent] = String(value).split('e');
  const fraction = mantissa.split('.')[1]?.length ?? 0;
  return Math.max(0, fraction - Number(exponent ?? 0));
}

/**
 * Exact for decimal steps such as 0.1 or 0.01: both sides are scaled to
 * integers before the remainder is taken. Falls back to float division once
 * the scaled values leave the safe integer range.
 */
export function isMultipleOf(value: number, divisor: number): boolean {
  const scale = 10 ** Math.max(decimalPlaces(value), decimalPlaces(divisor));
  const scaledValue = Math.round(value * scale);
  const scaledDivisor = Math.round(divisor * scale);
  if (Number.isSafeInteger(scaledValue) && Number.isSafeInteger(scaledDivisor)) {
    return scaledValue % scaledDivisor === 0;
  }
  return Number.isInteger(value / divisor);
}

interface Bound {
  readonly limit: number;
  readonly exclusive: boolean;
  readonly keyword: string;
}

function lowerBound(
  node: SchemaNode,
  keyword: 'minimum' | 'exclusiveMinimum',
  value: Json,
  scope: EvaluationScope
): Bound | undefined {
  if (typeof value !== 'number') return undefined;
  if (keyword === 'exclusiveMinimum') {
    return scope.ctx.profile.exclusiveBounds === 'numeric'
      ? { limit: value, exclusive: true, keyword }
      : undefined;
  }
  const exclusive =
    scope.ctx.profile.exclusiveBounds === 'boolean' &&
    readKeyword(node, 'exclusiveMinimum', scope) === true;
  return { limit: value, exclusive, keyword };
}

function upperBound(
  node: SchemaNode,
  keyword: 'maximum' | 'exclusiveMaximum',
  value: Json,
  scope: EvaluationScope
): Bound | undefined {
  if (typeof value !== 'number') return undefined;
  if (keyword === 'exclusiveMaximum') {
    return scope.ctx.profile.exclusiveBounds === 'numeric'
      ? { limit: value, exclusive: true, keyword }
      : undefined;
  }
  const exclusive =
    scope.ctx.profile.exclusiveBounds === 'boolean' &&
    readKeyword(node, 'exclusiveMaximum', scope) === true;
  return { limit: value, exclusive, keyword };
}

function checkBound(
  instance: number,
  bound: Bound,
  side: 'lower' | 'upper',
  scope: EvaluationScope
): FailureRecord | undefined {
  const { limit, exclusive, keyword } = bound;
  const within =
    side === 'lower'
      ? exclusive
        ? instance > limit
        : instance >= limit
      : exclusive
        ? instance < limit
        : instance <= limit;
  if (within) return undefined;

  const kind: FailureKind =
    side === 'lower'
      ? exclusive
        ? 'exclusive-minimum'
        : 'minimum'
      : exclusive
        ? 'exclusive-maximum'
        : 'maximum';
  const relation =
    side === 'lower' ? (exclusive ? '>' : '>=') : exclusive ? '<' : '<=';
  return failure(scope, keyword, kind, `Must be ${relation} ${limit}`, {
    limit,
    exclusive,
    actual: instance,
  });
}

export const rangeEvaluator: ConstraintEvaluator = {
  name: 'range',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    if (typeof instance !== 'number') return [];
    const failures: FailureRecord[] = [];

    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      let result: FailureRecord | undefined;
      switch (keyword) {
        case 'minimum':
        case 'exclusiveMinimum': {
          const bound = lowerBound(node, keyword, value, scope);
          result = bound && checkBound(instance, bound, 'lower', scope);
          break;
        }
        case 'maximum':
        case 'exclusiveMaximum': {
          const bound = upperBound(node, keyword, value, scope);
          result = bound && checkBound(instance, bound, 'upper', scope);
          break;
        }
        case 'multipleOf':
          if (typeof value !== 'number' || value <= 0) {
            result = invalidKeyword(scope, keyword, 'must be a number above 0');
          } else if (!isMultipleOf(instance, value)) {
            result = failure(
              scope,
              keyword,
              'multiple-of',
              `Must be a multiple of ${value}`,
              { multipleOf: value, actual: instance }
            );
          }
          break;
      }
      if (result) failures.push(result);
    }
    return failures;
  },
};
