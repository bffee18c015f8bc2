import { describe, expect, it } from 'vitest';

import {
  FIXED_TIME,
  RECORD_SCHEMA,
  makeReport,
} from '../test-utils/make-report.js';
import { renderMarkdownReport } from './markdown.js';

describe('renderMarkdownReport', () => {
  it('includes header, summary and failure tables', () => {
    const report = makeReport(RECORD_SCHEMA, [{ id: 1.5, tag: 'c' }, { id: 1 }]);
    const lines = renderMarkdownReport(report).split('\n');

    expect(lines[0]).toBe('# Validation Report – test-schema');
    expect(lines).toContain(`- Timestamp: ${FIXED_TIME}`);
    expect(lines).toContain('- Dialect: 2020-12');
    expect(lines).toContain(`- Schema hash: \`${report.schemaHash}\``);
    expect(lines).toContain('  - invalid: 1');
    expect(lines).toContain('| enum | 1 |');
    expect(lines).toContain('### Instance #0 – invalid');
    expect(lines).toContain(
      '| `/id` | `#/properties/id/type` | type | Expected integer, got number | {"expected":["integer"],"actual":"number"} |'
    );
    expect(lines).toContain('### Instance #1 – valid');
    expect(lines).toContain('No failures.');
  });

  it('escapes pipes inside cells', () => {
    const report = makeReport({ pattern: '^a|b$' }, ['c']);
    expect(renderMarkdownReport(report).split('\n')).toContain(
      '| `(root)` | `#/pattern` | pattern | Must match pattern ^a\\|b$ | {"pattern":"^a\\|b$"} |'
    );
  });

  it('marks causes with an arrow', () => {
    const report = makeReport(
      { oneOf: [{ type: 'string' }, { type: 'number' }] },
      [null]
    );
    const lines = renderMarkdownReport(report).split('\n');
    expect(lines).toContain(
      '| ↳ `(root)` | `#/oneOf/0/type` | type | Expected string, got null | {"expected":["string"],"actual":"null"} |'
    );
  });
});
