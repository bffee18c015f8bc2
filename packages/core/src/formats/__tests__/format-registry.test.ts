import { describe, expect, test } from 'vitest';
import {
  AJV_FORMAT_NAMES,
  FormatRegistry,
  createDefaultFormatRegistry,
  fromAjvFormat,
} from '../format-registry.js';

function check(registry: FormatRegistry, name: string, value: string | number) {
  const format = registry.get(name);
  if (!format) throw new Error(`format ${name} missing`);
  if (format.type === 'string') {
    return typeof value === 'string' ? format.validate(value) : undefined;
  }
  return typeof value === 'number' ? format.validate(value) : undefined;
}

describe('default format registry', () => {
  const registry = createDefaultFormatRegistry();

  test('checks calendar dates', () => {
    expect(check(registry, 'date', '2024-02-29')).toBe(true);
    expect(check(registry, 'date', '2024-02-30')).toBe(false);
    expect(check(registry, 'date', '2023-02-29')).toBe(false);
  });

  test('checks common string formats', () => {
    expect(check(registry, 'email', 'user@example.test')).toBe(true);
    expect(check(registry, 'email', 'not-an-email')).toBe(false);
    expect(check(registry, 'uuid', '123e4567-e89b-12d3-a456-426614174000')).toBe(true);
    expect(check(registry, 'uuid', '123e4567')).toBe(false);
    expect(check(registry, 'ipv4', '192.168.0.1')).toBe(true);
    expect(check(registry, 'ipv4', '256.1.1.1')).toBe(false);
  });

  test('includes OpenAPI numeric formats', () => {
    expect(registry.get('int32')?.type).toBe('number');
    expect(check(registry, 'int32', 2147483647)).toBe(true);
    expect(check(registry, 'int32', 2147483648)).toBe(false);
    expect(check(registry, 'int32', 1.5)).toBe(false);
    expect(registry.has('double')).toBe(true);
  });

  test('registers every ajv-formats full-mode format', () => {
    for (const name of AJV_FORMAT_NAMES) {
      expect(registry.has(name)).toBe(true);
    }
    expect(registry.get('uri-template')?.type).toBe('string');
  });

  test('names are sorted', () => {
    const names = registry.names();
    expect(names).toEqual([...names].sort());
    expect(names).toContain('date-time');
  });
});

describe('FormatRegistry', () => {
  test('registers, clones and unregisters', () => {
    const registry = new FormatRegistry()
      .registerString('even-length', (value) => value.length % 2 === 0)
      .registerNumber('positive', (value) => value > 0);
    const copy = registry.clone();
    expect(registry.unregister('positive')).toBe(true);
    expect(registry.has('positive')).toBe(false);
    expect(copy.has('positive')).toBe(true);
    expect(check(copy, 'even-length', 'ab')).toBe(true);
  });
});

describe('fromAjvFormat', () => {
  test('adapts every definition shape', () => {
    const fromRegex = fromAjvFormat(/^a+$/);
    expect(fromRegex?.type === 'string' && fromRegex.validate('aaa')).toBe(true);

    const fromSource = fromAjvFormat('^b$');
    expect(fromSource?.type === 'string' && fromSource.validate('c')).toBe(false);

    const anything = fromAjvFormat(true);
    expect(anything?.type === 'string' && anything.validate('x')).toBe(true);

    const numeric = fromAjvFormat({ type: 'number', validate: (n: number) => n < 10 });
    expect(numeric?.type === 'number' && numeric.validate(3)).toBe(true);

    const nested = fromAjvFormat({ validate: /^\d+$/ });
    expect(nested?.type === 'string' && nested.validate('12')).toBe(true);

    expect(fromAjvFormat({ async: true, validate: async () => true })).toBeUndefined();
  });
});
