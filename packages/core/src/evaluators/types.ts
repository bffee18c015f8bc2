import type { Instance } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';

/**
 * One family of constraints. The engine calls `evaluate` once per node, when
 * it meets the first keyword the evaluator owns; the evaluator then handles
 * all of its keywords in the node's declaration order.
 */
export interface ConstraintEvaluator {
  readonly name: string;
  readonly keywords: readonly string[];
  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[];
}
