import type { BooleanSchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure } from './scope.js';

/** `true` accepts everything, `false` nothing. */
export function evaluateBooleanSchema(
  node: BooleanSchemaNode,
  scope: EvaluationScope
): FailureRecord[] {
  if (node.value) return [];
  return [failure(scope, [], 'false-schema', 'No value is allowed here')];
}
