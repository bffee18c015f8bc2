/**
 * Data model of the reporting layer. A Report is plain JSON: paths are
 * rendered as JSON Pointers and errors are serialized, so `--format json`
 * can print it as is.
 */
import type {
  Dialect,
  FailureCategory,
  FailureDetails,
  FailureKind,
  SerializedError,
} from '@shapecheck/core';

export interface ReportEntry {
  kind: FailureKind;
  category: FailureCategory;
  message: string;
  /** JSON Pointer into the instance ('' for the root). */
  instancePath: string;
  /** JSON Pointer into the schema, fragment form ('#/properties/id/type'). */
  schemaPath: string;
  details: FailureDetails;
  causes?: ReportEntry[];
}

export type InstanceStatus = 'valid' | 'invalid' | 'aborted';

export interface InstanceReport {
  index: number;
  /** File or label the instance was read from. */
  source?: string;
  status: InstanceStatus;
  failures: ReportEntry[];
  /** Set when the step budget ran out before a verdict. */
  error?: SerializedError;
}

export interface ReportMeta {
  toolName: string;
  toolVersion: string;
  engineVersion?: string;
  timestamp: string;
}

export interface ReportSummary {
  totalInstances: number;
  valid: number;
  invalid: number;
  aborted: number;
  /** Top-level failures; nested causes are not counted here. */
  failures: {
    total: number;
    semantic: number;
    structural: number;
  };
  /** Top-level failures per kind, keys sorted. */
  byKind: Partial<Record<FailureKind, number>>;
}

/**
 * Public, stable representation of a validation run.
 * Consumers may rely on this shape across reporter releases unless otherwise documented.
 */
export interface Report {
  /** Logical identifier of the schema (path, URI or friendly name). */
  schemaId: string;
  /** sha256 of the canonical schema text, for change detection. */
  schemaHash: string;
  dialect: Dialect;
  /** Fragment of the document validated against, when not the root. */
  pointer?: string;
  meta: ReportMeta;
  instances: InstanceReport[];
  summary: ReportSummary;
}

/** Aggregate counters derived from the instance list. */
export function buildReportSummary(instances: InstanceReport[]): ReportSummary {
  const summary: ReportSummary = {
    totalInstances: instances.length,
    valid: 0,
    invalid: 0,
    aborted: 0,
    failures: { total: 0, semantic: 0, structural: 0 },
    byKind: {},
  };
  const byKind = new Map<FailureKind, number>();

  for (const instance of instances) {
    summary[instance.status] += 1;
    for (const entry of instance.failures) {
      summary.failures.total += 1;
      summary.failures[entry.category] += 1;
      byKind.set(entry.kind, (byKind.get(entry.kind) ?? 0) + 1);
    }
  }

  for (const kind of [...byKind.keys()].sort()) {
    summary.byKind[kind] = byKind.get(kind);
  }
  return summary;
}
