import type { Instance, PathSegment } from '../document/json.js';
import { encodePointer } from '../document/pointer.js';
import type { SchemaDocument, SchemaNode } from '../document/schema-node.js';
import type { KeywordProfile } from '../dialect/profiles.js';
import type { FailureRecord } from '../diag/failure.js';
import { LimitExceededError } from '../errors/errors.js';
import type { FormatRegistry } from '../formats/format-registry.js';
import {
  createResolutionContext,
  type ReferenceResolver,
  type ResolutionContext,
} from '../resolver/reference-resolver.js';

export interface EvaluationLimits {
  /** Maximum nesting of `$ref` re-entries before `depth-exceeded`. */
  readonly maxDepth: number;
  /** Maximum (node, instance) evaluations before the call aborts. */
  readonly maxSteps: number;
  /** Maximum chain of nested subschema evaluations before `depth-exceeded`. */
  readonly maxNesting: number;
}

/** Where an evaluation currently stands. */
export interface EvaluationScope {
  /** Document owning the node under evaluation (differs after a remote $ref). */
  readonly document: SchemaDocument;
  readonly instancePath: readonly PathSegment[];
  readonly schemaPath: readonly PathSegment[];
  readonly ctx: EvaluationContext;
}

export type EvaluateNode = (
  node: SchemaNode,
  instance: Instance,
  scope: EvaluationScope
) => FailureRecord[];

/**
 * Mutable state of one validate call: resolution chain and cache, step and
 * depth counters, compiled patterns. Nothing here outlives the call.
 */
export class EvaluationContext {
  readonly resolution: ResolutionContext = createResolutionContext();
  steps = 0;
  refDepth = 0;
  /** Subschema evaluations currently open, the root included. */
  nesting = 0;
  readonly #patterns = new Map<string, RegExp | SyntaxError>();

  constructor(
    readonly resolver: ReferenceResolver,
    readonly profile: KeywordProfile,
    readonly formats: FormatRegistry | undefined,
    readonly limits: EvaluationLimits,
    readonly evaluate: EvaluateNode
  ) {}

  /** Count one evaluation step; throws once the budget is spent. */
  tick(scope: EvaluationScope): void {
    this.steps += 1;
    if (this.steps > this.limits.maxSteps) {
      throw new LimitExceededError(this.limits.maxSteps, {
        path: encodePointer(scope.instancePath),
      });
    }
  }

  /** Compile a `pattern`/`patternProperties` source once per call. */
  pattern(source: string): RegExp | SyntaxError {
    let compiled = this.#patterns.get(source);
    if (!compiled) {
      try {
        compiled = new RegExp(source, 'u');
      } catch (error) {
        compiled =
          error instanceof SyntaxError ? error : new SyntaxError(String(error));
      }
      this.#patterns.set(source, compiled);
    }
    return compiled;
  }
}
