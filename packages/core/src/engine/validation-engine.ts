import type { Instance, PathSegment } from '../document/json.js';
import { decodePointer, encodePointer } from '../document/pointer.js';
import type { SchemaDocument, SchemaNode } from '../document/schema-node.js';
import { detectDialect, type Dialect } from '../dialect/detectDialect.js';
import { getProfile, type KeywordProfile } from '../dialect/profiles.js';
import {
  toValidationResult,
  type FailureRecord,
  type ValidationResult,
} from '../diag/failure.js';
import { ConfigurationError, LimitExceededError } from '../errors/errors.js';
import {
  DEFAULT_EVALUATORS,
  evaluateBooleanSchema,
  failure,
} from '../evaluators/index.js';
import type { ConstraintEvaluator } from '../evaluators/types.js';
import { DocumentRegistry } from '../resolver/registry.js';
import { ReferenceResolver } from '../resolver/reference-resolver.js';
import { EvaluationContext, type EvaluationScope } from './context.js';
import {
  MAX_EVALUATION_NESTING,
  resolveEngineOptions,
  type EngineOptions,
  type ResolvedEngineOptions,
} from './options.js';

export interface ValidateOptions {
  /**
   * Validate against the subschema at this pointer instead of the root,
   * e.g. '#/components/schemas/Pet'.
   */
  pointer?: string;
}

export type BatchVerdict =
  | {
      readonly index: number;
      readonly status: 'valid' | 'invalid';
      readonly result: ValidationResult;
    }
  | {
      readonly index: number;
      readonly status: 'aborted';
      readonly error: LimitExceededError;
    };

/**
 * Orchestrates reference resolution and constraint evaluation.
 *
 * An engine holds configuration and registered documents only; every
 * validate call builds its own EvaluationContext, so one engine (and one
 * SchemaDocument) can serve any number of calls.
 */
export class ValidationEngine {
  readonly options: ResolvedEngineOptions;
  private readonly registry = new DocumentRegistry();
  private readonly resolver = new ReferenceResolver(this.registry);
  private readonly owners = new Map<string, ConstraintEvaluator>();

  constructor(options: EngineOptions = {}) {
    this.options = resolveEngineOptions(options);
    // a keyword belongs to the first evaluator that lists it
    for (const evaluator of [...DEFAULT_EVALUATORS, ...this.options.evaluators]) {
      for (const keyword of evaluator.keywords) {
        if (!this.owners.has(keyword)) this.owners.set(keyword, evaluator);
      }
    }
  }

  /** Make `uri#pointer` references resolvable. */
  registerDocument(uri: string, document: SchemaDocument): this {
    this.registry.add(uri, document);
    return this;
  }

  dialectOf(document: SchemaDocument): Dialect {
    return this.options.dialect === 'auto'
      ? detectDialect(document)
      : this.options.dialect;
  }

  profileOf(document: SchemaDocument): KeywordProfile {
    return getProfile(this.dialectOf(document));
  }

  /**
   * @throws {LimitExceededError} when the step budget runs out
   * @throws {ConfigurationError} when `options.pointer` does not name a schema
   */
  validate(
    document: SchemaDocument,
    instance: Instance,
    options: ValidateOptions = {}
  ): ValidationResult {
    const { node, schemaPath } = this.entryPoint(document, options.pointer);
    const ctx = new EvaluationContext(
      this.resolver,
      this.profileOf(document),
      this.options.validateFormats ? this.options.formats : undefined,
      {
        maxDepth: this.options.maxDepth,
        maxSteps: this.options.maxSteps,
        maxNesting: MAX_EVALUATION_NESTING,
      },
      (child, value, scope) => this.evaluate(child, value, scope)
    );
    const failures = this.evaluate(node, instance, {
      document,
      instancePath: [],
      schemaPath,
      ctx,
    });
    return toValidationResult(failures);
  }

  /**
   * Validate each instance on its own; a step-limit abort affects only the
   * instance that hit it. Verdicts keep input order.
   */
  validateBatch(
    document: SchemaDocument,
    instances: Iterable<Instance>,
    options: ValidateOptions = {}
  ): BatchVerdict[] {
    const verdicts: BatchVerdict[] = [];
    let index = 0;
    for (const instance of instances) {
      try {
        const result = this.validate(document, instance, options);
        verdicts.push({
          index,
          status: result.valid ? 'valid' : 'invalid',
          result,
        });
      } catch (error) {
        if (!(error instanceof LimitExceededError)) throw error;
        verdicts.push({ index, status: 'aborted', error });
      }
      index++;
    }
    return verdicts;
  }

  private entryPoint(
    document: SchemaDocument,
    pointer: string | undefined
  ): { node: SchemaNode; schemaPath: PathSegment[] } {
    if (pointer === undefined) return { node: document.root, schemaPath: [] };
    const segments = decodePointer(pointer);
    const node = segments && document.node(encodePointer(segments));
    if (!segments || !node) {
      throw new ConfigurationError(`No schema at pointer "${pointer}"`, {
        schemaPath: pointer,
      });
    }
    return { node, schemaPath: segments };
  }

  private evaluate(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const { ctx } = scope;
    ctx.tick(scope);
    if (ctx.nesting >= ctx.limits.maxNesting) {
      return [
        failure(
          scope,
          [],
          'depth-exceeded',
          `Schema nesting limit of ${ctx.limits.maxNesting} exceeded`,
          { maxNesting: ctx.limits.maxNesting }
        ),
      ];
    }
    ctx.nesting++;
    try {
      return this.evaluateKeywords(node, instance, scope);
    } finally {
      ctx.nesting--;
    }
  }

  private evaluateKeywords(
    node: SchemaNode,
    instance: Instance,
    scope: EvaluationScope
  ): FailureRecord[] {
    const { ctx } = scope;
    if (node.kind === 'boolean-literal') {
      return evaluateBooleanSchema(node, scope);
    }

    const siblingsIgnored =
      node.kind === 'reference' && ctx.profile.refSiblings === 'ignore';
    const ran = new Set<ConstraintEvaluator>();
    const failures: FailureRecord[] = [];
    for (const keyword of node.keywords.keys()) {
      if (siblingsIgnored && keyword !== '$ref') continue;
      if (ctx.profile.ignoredKeywords.has(keyword)) continue;
      const evaluator = this.owners.get(keyword);
      if (!evaluator || ran.has(evaluator)) continue;
      ran.add(evaluator);
      failures.push(...evaluator.evaluate(node, instance, scope));
    }
    return failures;
  }
}

/** One-shot validation with a throwaway engine. */
export function validate(
  document: SchemaDocument,
  instance: Instance,
  options: EngineOptions & ValidateOptions = {}
): ValidationResult {
  const { pointer, ...engineOptions } = options;
  return new ValidationEngine(engineOptions).validate(document, instance, {
    pointer,
  });
}
