import { isJsonArray, type Instance, type Json, type JsonArray } from '../document/json.js';
import { canonicalKey } from '../document/equality.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import {
  evaluateChild,
  failure,
  invalidKeyword,
  isNonNegativeInteger,
  ownedKeywords,
  readKeyword,
} from './scope.js';
import type { ConstraintEvaluator } from './types.js';

const ITEM_KEYWORDS = ['items', 'prefixItems', 'additionalItems'];
const KEYWORDS = [
  ...ITEM_KEYWORDS,
  'minItems',
  'maxItems',
  'uniqueItems',
  'contains',
];

interface ItemLayout {
  /** Keyword holding positional schemas, if any. */
  readonly tuple?: 'items' | 'prefixItems';
  readonly tupleLength: number;
  /** Keyword whose schema applies past the positional ones. */
  readonly rest?: 'items' | 'additionalItems';
}

/**
 * Positional schemas come from `prefixItems`, or from an array-valued
 * `items` in profiles that use it for tuples; the rest go to `items` or
 * `additionalItems` respectively. Where `prefixItems` holds the tuple, an
 * array-valued `items` is not a schema and constrains nothing.
 */
function layoutOf(node: SchemaNode, scope: EvaluationScope): ItemLayout {
  const items = readKeyword(node, 'items', scope);
  const prefixItems = readKeyword(node, 'prefixItems', scope);

  if (scope.ctx.profile.tupleKeyword === 'prefixItems') {
    const tupleLength = Array.isArray(prefixItems) ? prefixItems.length : 0;
    return {
      tuple: tupleLength > 0 ? 'prefixItems' : undefined,
      tupleLength,
      rest: items !== undefined && !Array.isArray(items) ? 'items' : undefined,
    };
  }
  if (Array.isArray(prefixItems)) {
    return {
      tuple: 'prefixItems',
      tupleLength: prefixItems.length,
      rest: items !== undefined && !Array.isArray(items) ? 'items' : undefined,
    };
  }
  if (Array.isArray(items)) {
    return {
      tuple: 'items',
      tupleLength: items.length,
      rest:
        readKeyword(node, 'additionalItems', scope) !== undefined
          ? 'additionalItems'
          : undefined,
    };
  }
  return {
    tupleLength: 0,
    rest: items !== undefined ? 'items' : undefined,
  };
}

function items(
  node: SchemaNode,
  instance: JsonArray,
  scope: EvaluationScope
): FailureRecord[] {
  const { tuple, tupleLength, rest } = layoutOf(node, scope);
  const failures: FailureRecord[] = [];

  if (tuple) {
    const end = Math.min(tupleLength, instance.length);
    for (let index = 0; index < end; index++) {
      failures.push(
        ...evaluateChild(node, [tuple, index], instance[index] ?? null, scope, index)
      );
    }
  }
  if (!rest || instance.length <= tupleLength) return failures;

  const restNode = scope.document.child(node, rest);
  if (restNode?.kind === 'boolean-literal' && !restNode.value) {
    failures.push(
      failure(
        scope,
        rest,
        'additional-items',
        `Must have at most ${tupleLength} items, got ${instance.length}`,
        { limit: tupleLength, actual: instance.length }
      )
    );
    return failures;
  }
  for (let index = tupleLength; index < instance.length; index++) {
    failures.push(
      ...evaluateChild(node, [rest], instance[index] ?? null, scope, index)
    );
  }
  return failures;
}

function itemCount(
  keyword: 'minItems' | 'maxItems',
  limit: Json,
  instance: JsonArray,
  scope: EvaluationScope
): FailureRecord[] {
  if (!isNonNegativeInteger(limit)) {
    return [invalidKeyword(scope, keyword, 'must be a non-negative integer')];
  }
  const size = instance.length;
  if (keyword === 'minItems' ? size >= limit : size <= limit) return [];
  return [
    failure(
      scope,
      keyword,
      keyword === 'minItems' ? 'min-items' : 'max-items',
      `Must have ${keyword === 'minItems' ? 'at least' : 'at most'} ${limit} items, got ${size}`,
      { limit, actual: size }
    ),
  ];
}

/** One failure per repeated item, pointing back at its first occurrence. */
function uniqueItems(instance: JsonArray, scope: EvaluationScope): FailureRecord[] {
  const seen = new Map<string, number>();
  const failures: FailureRecord[] = [];
  instance.forEach((item, index) => {
    const key = canonicalKey(item);
    const first = seen.get(key);
    if (first === undefined) {
      seen.set(key, index);
      return;
    }
    failures.push(
      failure(
        scope,
        'uniqueItems',
        'unique-items',
        `Items ${first} and ${index} are identical`,
        { indices: [first, index] }
      )
    );
  });
  return failures;
}

function contains(
  node: SchemaNode,
  instance: JsonArray,
  scope: EvaluationScope
): FailureRecord[] {
  const minValue = readKeyword(node, 'minContains', scope);
  const maxValue = readKeyword(node, 'maxContains', scope);
  const min =
    minValue !== undefined && isNonNegativeInteger(minValue) ? minValue : 1;
  const max =
    maxValue !== undefined && isNonNegativeInteger(maxValue) ? maxValue : undefined;

  let matches = 0;
  instance.forEach((item, index) => {
    if (evaluateChild(node, ['contains'], item, scope, index).length === 0) {
      matches++;
    }
  });

  if (matches >= min && (max === undefined || matches <= max)) return [];
  const message =
    matches < min
      ? `Must contain at least ${min} matching items, found ${matches}`
      : `Must contain at most ${max} matching items, found ${matches}`;
  return [
    failure(scope, 'contains', 'contains', message, {
      matches,
      minContains: min,
      maxContains: max ?? null,
    }),
  ];
}

export const arrayEvaluator: ConstraintEvaluator = {
  name: 'array-shape',
  keywords: KEYWORDS,

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    if (!isJsonArray(instance)) return [];
    const failures: FailureRecord[] = [];
    let itemsDone = false;

    for (const [keyword, value] of ownedKeywords(node, KEYWORDS, scope)) {
      switch (keyword) {
        case 'items':
        case 'prefixItems':
        case 'additionalItems':
          if (!itemsDone) failures.push(...items(node, instance, scope));
          itemsDone = true;
          break;
        case 'minItems':
        case 'maxItems':
          failures.push(...itemCount(keyword, value, instance, scope));
          break;
        case 'uniqueItems':
          if (value === true) failures.push(...uniqueItems(instance, scope));
          break;
        case 'contains':
          failures.push(...contains(node, instance, scope));
          break;
      }
    }
    return failures;
  },
};
