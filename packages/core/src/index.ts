// @shapecheck/core entry point
//
// Public API:
// - parseSchema()/parseInstance() turn raw input into a SchemaDocument and an Instance.
// - ValidationEngine (and the one-shot validate()) return a ValidationResult of
//   FailureRecords; only LimitExceededError is thrown during validation.
// - Errors, Result, dialect detection, formats and evaluator building blocks for
//   the CLI, the reporter and custom evaluators.

// Document model
export type {
  Instance,
  Json,
  JsonArray,
  JsonObject,
  JsonType,
  PathSegment,
} from './document/json.js';
export { isJsonArray, isJsonObject, jsonTypeOf } from './document/json.js';
export {
  decodePointer,
  encodePointer,
  normalizePointer,
  toFragment,
  type JsonPointer,
} from './document/pointer.js';
export { canonicalKey, deepEqual } from './document/equality.js';
export { MAX_NESTING_DEPTH, type SourceSyntax } from './document/decode.js';
export {
  SchemaDocument,
  type BooleanSchemaNode,
  type KeywordSchemaNode,
  type ReferenceSchemaNode,
  type SchemaNode,
  type SchemaNodeKind,
} from './document/schema-node.js';
export { parseSchema, type ParseSchemaOptions } from './document/parse-schema.js';
export {
  parseInstance,
  type ParseInstanceOptions,
} from './document/parse-instance.js';

// Dialects
export {
  DEFAULT_DIALECT,
  DIALECTS,
  detectDialect,
  isDialect,
  type Dialect,
} from './dialect/detectDialect.js';
export { getProfile, type KeywordProfile } from './dialect/profiles.js';

// Reference resolution
export { DocumentRegistry } from './resolver/registry.js';
export {
  ReferenceResolver,
  createResolutionContext,
  type ResolutionContext,
  type ResolvedReference,
} from './resolver/reference-resolver.js';

// Formats
export {
  FormatRegistry,
  createDefaultFormatRegistry,
  type FormatCheck,
} from './formats/format-registry.js';

// Evaluators
export {
  DEFAULT_EVALUATORS,
  evaluateChild,
  failure,
  invalidKeyword,
  matchesChild,
  ownedKeywords,
  readKeyword,
  type ConstraintEvaluator,
} from './evaluators/index.js';

// Engine
export {
  EvaluationContext,
  type EvaluationLimits,
  type EvaluationScope,
} from './engine/context.js';
export {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_STEPS,
  MAX_EVALUATION_NESTING,
  resolveEngineOptions,
  type EngineOptions,
  type ResolvedEngineOptions,
} from './engine/options.js';
export {
  ValidationEngine,
  validate,
  type BatchVerdict,
  type ValidateOptions,
} from './engine/validation-engine.js';

// Diagnostics
export {
  categoryOf,
  countFailures,
  toValidationResult,
  type FailureCategory,
  type FailureDetails,
  type FailureKind,
  type FailureRecord,
  type SemanticFailureKind,
  type StructuralFailureKind,
  type ValidationResult,
} from './diag/failure.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  ExitStatus,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  ConfigurationError,
  InputNotFoundError,
  InternalError,
  LimitExceededError,
  ParseError,
  ShapecheckError,
  isShapecheckError,
  type ErrorContext,
  type SerializedError,
} from './errors/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { Err, Ok, err, isErr, isOk, ok, type Result } from './types/result.js';
