import { createHash } from 'node:crypto';
import { createRequire } from 'node:module';
import {
  canonicalKey,
  encodePointer,
  toFragment,
  type BatchVerdict,
  type Dialect,
  type FailureRecord,
  type SchemaDocument,
} from '@shapecheck/core';

import {
  buildReportSummary,
  type InstanceReport,
  type Report,
  type ReportEntry,
} from '../model/report.js';

const require = createRequire(import.meta.url);
const reporterPkg = require('../../package.json') as {
  name?: string;
  version?: string;
};
const corePkg = require('@shapecheck/core/package.json') as {
  version?: string;
};

const TOOL_NAME =
  typeof reporterPkg.name === 'string' ? reporterPkg.name : 'shapecheck';
const TOOL_VERSION =
  typeof reporterPkg.version === 'string' ? reporterPkg.version : '0.0.0';
const ENGINE_VERSION =
  typeof corePkg.version === 'string' ? corePkg.version : undefined;

export interface BuildReportOptions {
  schemaId: string;
  document: SchemaDocument;
  dialect: Dialect;
  verdicts: readonly BatchVerdict[];
  pointer?: string;
  /** Source label per verdict index. */
  sources?: readonly string[];
  toolName?: string;
  toolVersion?: string;
  now?: () => Date;
}

export function toReportEntry(failure: FailureRecord): ReportEntry {
  const entry: ReportEntry = {
    kind: failure.kind,
    category: failure.category,
    message: failure.message,
    instancePath: encodePointer(failure.instancePath),
    schemaPath: toFragment(encodePointer(failure.schemaPath)),
    details: failure.details,
  };
  if (failure.causes && failure.causes.length > 0) {
    entry.causes = failure.causes.map(toReportEntry);
  }
  return entry;
}

function toInstanceReport(
  verdict: BatchVerdict,
  source: string | undefined
): InstanceReport {
  const base = source === undefined ? {} : { source };
  if (verdict.status === 'aborted') {
    return {
      index: verdict.index,
      ...base,
      status: 'aborted',
      failures: [],
      error: verdict.error.toJSON('prod'),
    };
  }
  return {
    index: verdict.index,
    ...base,
    status: verdict.status,
    failures: verdict.result.failures.map(toReportEntry),
  };
}

export function hashSchema(document: SchemaDocument): string {
  return createHash('sha256').update(canonicalKey(document.raw)).digest('hex');
}

export function buildReport(options: BuildReportOptions): Report {
  const instances = options.verdicts.map((verdict) =>
    toInstanceReport(verdict, options.sources?.[verdict.index])
  );
  const now = options.now ?? (() => new Date());

  return {
    schemaId: options.schemaId,
    schemaHash: hashSchema(options.document),
    dialect: options.dialect,
    ...(options.pointer === undefined ? {} : { pointer: options.pointer }),
    meta: {
      toolName: options.toolName ?? TOOL_NAME,
      toolVersion: options.toolVersion ?? TOOL_VERSION,
      engineVersion: ENGINE_VERSION,
      timestamp: now().toISOString(),
    },
    instances,
    summary: buildReportSummary(instances),
  } satisfies Report;
}
