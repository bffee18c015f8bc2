import type { Instance } from '../document/json.js';
import { parseSchema } from '../document/parse-schema.js';
import type { SchemaDocument } from '../document/schema-node.js';
import type { FailureRecord, ValidationResult } from '../diag/failure.js';
import type { EngineOptions } from '../engine/options.js';
import {
  validate,
  type ValidateOptions,
} from '../engine/validation-engine.js';

/** Parse a schema or fail the test. */
export function schemaOf(raw: unknown): SchemaDocument {
  const result = parseSchema(raw);
  if (result.isErr()) throw result.error;
  return result.value;
}

export function check(
  raw: unknown,
  instance: Instance,
  options: EngineOptions & ValidateOptions = {}
): ValidationResult {
  return validate(schemaOf(raw), instance, options);
}

/** Compact view of a failure for assertions. */
export function brief(failure: FailureRecord) {
  return {
    kind: failure.kind,
    instancePath: failure.instancePath,
    schemaPath: failure.schemaPath,
  };
}
