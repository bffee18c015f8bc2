import {
  ValidationEngine,
  parseSchema,
  type EngineOptions,
  type Instance,
} from '@shapecheck/core';

import { buildReport } from '../engine/report-builder.js';
import type { Report } from '../model/report.js';

export const FIXED_TIME = '2026-01-02T03:04:05.000Z';

export const RECORD_SCHEMA = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer' },
    tag: { enum: ['a', 'b'] },
  },
};

export function makeReport(
  schema: unknown,
  instances: Instance[],
  options: {
    engine?: EngineOptions;
    sources?: string[];
    pointer?: string;
  } = {}
): Report {
  const document = parseSchema(schema).unwrap();
  const engine = new ValidationEngine(options.engine);
  return buildReport({
    schemaId: 'test-schema',
    document,
    dialect: engine.dialectOf(document),
    verdicts: engine.validateBatch(document, instances, {
      pointer: options.pointer,
    }),
    pointer: options.pointer,
    sources: options.sources,
    now: () => new Date(FIXED_TIME),
  });
}
