import type { Instance, Json, PathSegment } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import {
  categoryOf,
  type FailureDetails,
  type FailureKind,
  type FailureRecord,
} from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';

/**
 * Keywords of `node` that belong to `owned`, in declaration order, minus the
 * ones the active profile does not define.
 */
export function* ownedKeywords(
  node: SchemaNode,
  owned: readonly string[],
  scope: EvaluationScope
): Generator<[string, Json]> {
  const ignored = scope.ctx.profile.ignoredKeywords;
  for (const [keyword, value] of node.keywords) {
    if (owned.includes(keyword) && !ignored.has(keyword)) {
      yield [keyword, value];
    }
  }
}

/** Keyword value, or undefined when absent or not part of the profile. */
export function readKeyword(
  node: SchemaNode,
  keyword: string,
  scope: EvaluationScope
): Json | undefined {
  if (scope.ctx.profile.ignoredKeywords.has(keyword)) return undefined;
  return node.keywords.get(keyword);
}

export function failure(
  scope: EvaluationScope,
  keyword: PathSegment | readonly PathSegment[],
  kind: FailureKind,
  message: string,
  details: FailureDetails = {},
  options: {
    instancePath?: readonly PathSegment[];
    causes?: readonly FailureRecord[];
  } = {}
): FailureRecord {
  const segments =
    typeof keyword === 'string' || typeof keyword === 'number'
      ? [keyword]
      : keyword;
  return {
    instancePath: options.instancePath ?? scope.instancePath,
    schemaPath: [...scope.schemaPath, ...segments],
    kind,
    category: categoryOf(kind),
    message,
    details,
    ...(options.causes ? { causes: options.causes } : {}),
  };
}

export function invalidKeyword(
  scope: EvaluationScope,
  keyword: string,
  reason: string
): FailureRecord {
  return failure(scope, keyword, 'invalid-keyword', `"${keyword}" ${reason}`, {
    keyword,
  });
}

/**
 * Evaluate the subschema found at `schemaSegments` below `node`. The
 * instance path gains `instanceSegment` when one is given.
 */
export function evaluateChild(
  node: SchemaNode,
  schemaSegments: readonly PathSegment[],
  instance: Instance,
  scope: EvaluationScope,
  instanceSegment?: PathSegment
): FailureRecord[] {
  const child = scope.document.child(node, ...schemaSegments);
  if (!child) return [];
  return scope.ctx.evaluate(child, instance, {
    ...scope,
    instancePath:
      instanceSegment === undefined
        ? scope.instancePath
        : [...scope.instancePath, instanceSegment],
    schemaPath: [...scope.schemaPath, ...schemaSegments],
  });
}

/** Whether the subschema at `schemaSegments` accepts `instance`. */
export function matchesChild(
  node: SchemaNode,
  schemaSegments: readonly PathSegment[],
  instance: Instance,
  scope: EvaluationScope
): boolean {
  return evaluateChild(node, schemaSegments, instance, scope).length === 0;
}

export function isNonNegativeInteger(value: Json): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function show(value: Json): string {
  return JSON.stringify(value);
}
