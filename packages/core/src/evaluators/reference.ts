import type { Instance, PathSegment } from '../document/json.js';
import type { SchemaNode } from '../document/schema-node.js';
import type { FailureRecord } from '../diag/failure.js';
import type { EvaluationScope } from '../engine/context.js';
import { failure } from './scope.js';
import type { ConstraintEvaluator } from './types.js';

/** Schema path segments for the references followed, `'$ref', ref` per hop. */
function hops(via: readonly string[]): PathSegment[] {
  return via.flatMap((ref) => ['$ref', ref]);
}

/**
 * Resolves `$ref` and evaluates the target under the same instance path.
 * Every nested reference counts towards `maxDepth`, which is what stops
 * self-referential schemas on deep or cyclic instances.
 */
export const referenceEvaluator: ConstraintEvaluator = {
  name: 'reference',
  keywords: ['$ref'],

  evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    if (node.kind !== 'reference') return [];
    const { ctx } = scope;
    const ref = node.refTarget;

    if (ctx.refDepth >= ctx.limits.maxDepth) {
      return [
        failure(
          scope,
          '$ref',
          'depth-exceeded',
          `Reference depth limit of ${ctx.limits.maxDepth} exceeded at ${ref}`,
          { ref, maxDepth: ctx.limits.maxDepth }
        ),
      ];
    }

    const resolved = ctx.resolver.resolve(ref, scope.document, ctx.resolution);
    if (resolved.status === 'unresolved') {
      return [
        failure(
          scope,
          '$ref',
          'unresolved-reference',
          `Cannot resolve reference ${ref}: ${resolved.reason}`,
          { ref, reason: resolved.reason }
        ),
      ];
    }

    const target =
      resolved.status === 'resolved'
        ? resolved.node
        : resolved.document.node(resolved.pointer);
    if (!target) {
      return [
        failure(
          scope,
          '$ref',
          'unresolved-reference',
          `Cannot resolve reference ${ref}: "#${resolved.pointer}" does not hold a schema`,
          { ref, reason: 'not a schema' }
        ),
      ];
    }

    ctx.refDepth++;
    try {
      return ctx.evaluate(target, instance, {
        ...scope,
        document: resolved.document,
        schemaPath: [...scope.schemaPath, ...hops(resolved.via)],
      });
    } finally {
      ctx.refDepth--;
    }
  },
};
