import { describe, expect, it } from 'vitest';

import { buildReportSummary, type InstanceReport } from './report.js';

const unresolved: InstanceReport['failures'][number] = {
  kind: 'unresolved-reference',
  category: 'structural',
  message: 'Cannot resolve "#/missing"',
  instancePath: '',
  schemaPath: '#/$ref',
  details: { ref: '#/missing' },
};

describe('buildReportSummary', () => {
  it('counts structural failures apart from semantic ones', () => {
    const summary = buildReportSummary([
      { index: 0, status: 'invalid', failures: [unresolved, unresolved] },
      { index: 1, status: 'valid', failures: [] },
    ]);
    expect(summary.failures).toEqual({ total: 2, semantic: 0, structural: 2 });
    expect(summary.byKind).toEqual({ 'unresolved-reference': 2 });
  });

  it('does not count nested causes', () => {
    const summary = buildReportSummary([
      {
        index: 0,
        status: 'invalid',
        failures: [
          {
            ...unresolved,
            kind: 'not',
            category: 'semantic',
            causes: [unresolved],
          },
        ],
      },
    ]);
    expect(summary.failures.total).toBe(1);
    expect(summary.byKind).toEqual({ not: 1 });
  });

  it('handles an empty run', () => {
    expect(buildReportSummary([])).toEqual({
      totalInstances: 0,
      valid: 0,
      invalid: 0,
      aborted: 0,
      failures: { total: 0, semantic: 0, structural: 0 },
      byKind: {},
    });
  });
});
