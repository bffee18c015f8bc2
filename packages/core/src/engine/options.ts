/**
 * Configuration options for the validation engine
 *
 * All options are optional; `resolveEngineOptions` fills in defaults and
 * rejects values the engine cannot work with.
 */

import { DIALECTS, type Dialect } from '../dialect/detectDialect.js';
import { ConfigurationError } from '../errors/errors.js';
import type { ConstraintEvaluator } from '../evaluators/types.js';
import {
  createDefaultFormatRegistry,
  type FormatRegistry,
} from '../formats/format-registry.js';

export interface EngineOptions {
  /** Keyword profile; 'auto' detects it from each document (default: 'auto') */
  dialect?: Dialect | 'auto';
  /** Maximum nested `$ref` evaluations (default: 100, at most MAX_EVALUATION_NESTING) */
  maxDepth?: number;
  /** Maximum evaluation steps per validate call (default: 1_000_000) */
  maxSteps?: number;
  /** Format predicates (default: ajv-formats full set) */
  formats?: FormatRegistry;
  /** Extra evaluators for keywords no built-in evaluator owns */
  evaluators?: readonly ConstraintEvaluator[];
  /** Apply `format` at all (default: true) */
  validateFormats?: boolean;
}

export interface ResolvedEngineOptions {
  readonly dialect: Dialect | 'auto';
  readonly maxDepth: number;
  readonly maxSteps: number;
  readonly formats: FormatRegistry;
  readonly evaluators: readonly ConstraintEvaluator[];
  readonly validateFormats: boolean;
}

export const DEFAULT_MAX_DEPTH = 100;
export const DEFAULT_MAX_STEPS = 1_000_000;
/** Deepest chain of subschema evaluations a validate call may open. */
export const MAX_EVALUATION_NESTING = 500;

function checkLimit(name: string, value: number, max?: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer`, {
      option: name,
      value,
    });
  }
  if (max !== undefined && value > max) {
    throw new ConfigurationError(`${name} must be at most ${max}`, {
      option: name,
      value,
    });
  }
}

/**
 * @throws {ConfigurationError} on a limit out of range, an unknown dialect
 * or an evaluator without keywords
 */
export function resolveEngineOptions(
  options: EngineOptions = {}
): ResolvedEngineOptions {
  const resolved: ResolvedEngineOptions = {
    dialect: options.dialect ?? 'auto',
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    formats: options.formats ?? createDefaultFormatRegistry(),
    evaluators: options.evaluators ?? [],
    validateFormats: options.validateFormats ?? true,
  };

  checkLimit('maxDepth', resolved.maxDepth, MAX_EVALUATION_NESTING);
  checkLimit('maxSteps', resolved.maxSteps);

  if (resolved.dialect !== 'auto' && !DIALECTS.includes(resolved.dialect)) {
    throw new ConfigurationError(
      `Unknown dialect "${String(resolved.dialect)}"; expected one of ${DIALECTS.join(', ')}`
    );
  }
  for (const evaluator of resolved.evaluators) {
    if (evaluator.keywords.length === 0) {
      throw new ConfigurationError(
        `Evaluator "${evaluator.name}" does not own any keyword`
      );
    }
  }
  return resolved;
}
