import { describe, it, expect } from 'vitest';
import {
  ExitStatus,
  ValidationEngine,
  parseInstance,
  parseSchema,
  type EngineOptions,
} from '../index.js';

describe('public API surface', () => {
  it('parses text inputs and validates end to end', () => {
    const schema = parseSchema('{"type": "object", "required": ["id"]}', {
      source: 'schema.json',
    });
    const instance = parseInstance('id: 1\n', { syntax: 'yaml' });
    expect(schema.isOk() && instance.isOk()).toBe(true);
    if (!schema.isOk() || !instance.isOk()) return;

    const result = new ValidationEngine().validate(schema.value, instance.value);
    expect(result).toEqual({ valid: true, failures: [] });
  });

  it('exposes engine options and exit statuses', () => {
    const options: EngineOptions = { maxDepth: 10, dialect: 'openapi-3.1' };
    expect(new ValidationEngine(options).options.maxDepth).toBe(10);
    expect(ExitStatus.INVALID).toBe(1);
    expect(ExitStatus.ABORTED).toBe(3);
  });
});
