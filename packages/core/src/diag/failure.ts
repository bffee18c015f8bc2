import type { Json, PathSegment } from '../document/json.js';

export type FailureCategory = 'semantic' | 'structural';

export type SemanticFailureKind =
  | 'type'
  | 'enum'
  | 'const'
  | 'minimum'
  | 'maximum'
  | 'exclusive-minimum'
  | 'exclusive-maximum'
  | 'multiple-of'
  | 'min-length'
  | 'max-length'
  | 'pattern'
  | 'format'
  | 'required'
  | 'additional-properties'
  | 'property-names'
  | 'min-properties'
  | 'max-properties'
  | 'dependent-required'
  | 'min-items'
  | 'max-items'
  | 'unique-items'
  | 'additional-items'
  | 'contains'
  | 'any-of'
  | 'one-of'
  | 'not'
  | 'false-schema';

export type StructuralFailureKind =
  | 'unresolved-reference'
  | 'depth-exceeded'
  | 'invalid-keyword';

export type FailureKind = SemanticFailureKind | StructuralFailureKind;

const STRUCTURAL_KINDS: ReadonlySet<FailureKind> = new Set<StructuralFailureKind>([
  'unresolved-reference',
  'depth-exceeded',
  'invalid-keyword',
]);

export function categoryOf(kind: FailureKind): FailureCategory {
  return STRUCTURAL_KINDS.has(kind) ? 'structural' : 'semantic';
}

export type FailureDetails = { readonly [key: string]: Json };

/** One located, typed constraint violation. */
export interface FailureRecord {
  /** Keys and indices from the instance root to the offending value. */
  readonly instancePath: readonly PathSegment[];
  /**
   * Keywords from the schema root to the failing keyword. A traversed
   * reference appears as '$ref' followed by the reference string; segments
   * after it are relative to the reference target.
   */
  readonly schemaPath: readonly PathSegment[];
  readonly kind: FailureKind;
  readonly category: FailureCategory;
  readonly message: string;
  readonly details: FailureDetails;
  /** Failures of the closest alternative, for anyOf/oneOf. */
  readonly causes?: readonly FailureRecord[];
}

export interface ValidationResult {
  /** Always equal to `failures.length === 0`. */
  readonly valid: boolean;
  readonly failures: readonly FailureRecord[];
}

export function toValidationResult(
  failures: readonly FailureRecord[]
): ValidationResult {
  return { valid: failures.length === 0, failures };
}

/** Number of records including nested causes. */
export function countFailures(failures: readonly FailureRecord[]): number {
  let total = 0;
  for (const failure of failures) {
    total += 1 + (failure.causes ? countFailures(failure.causes) : 0);
  }
  return total;
}
