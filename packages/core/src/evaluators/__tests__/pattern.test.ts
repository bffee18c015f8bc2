import { describe, expect, test } from 'vitest';
import { FormatRegistry } from '../../formats/format-registry.js';
import { check } from '../../test-utils/harness.js';

describe('pattern evaluator', () => {
  test('matches unanchored Unicode patterns', () => {
    expect(check({ pattern: 'b' }, 'abc').valid).toBe(true);
    expect(check({ pattern: '^\\p{Lu}' }, 'Émile').valid).toBe(true);
    const result = check({ pattern: '^a' }, 'b');
    expect(result.failures[0]?.details).toEqual({ pattern: '^a' });
    expect(result.failures[0]?.message).toBe('Must match pattern ^a');
  });

  test('an invalid pattern is a structural failure', () => {
    const result = check({ pattern: '(' }, 'x');
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.kind).toBe('invalid-keyword');
    expect(result.failures[0]?.category).toBe('structural');
    expect(result.failures[0]?.message).toMatch(
      /^"pattern" is not a valid regular expression/
    );
  });

  test('ignores non-strings', () => {
    expect(check({ pattern: '^a' }, 5).valid).toBe(true);
  });
});

describe('format evaluator', () => {
  test('checks registered formats of the matching type', () => {
    expect(check({ format: 'email' }, 'user@example.test').valid).toBe(true);
    const result = check({ format: 'email' }, 'nope');
    expect(result.failures[0]?.kind).toBe('format');
    expect(result.failures[0]?.message).toBe('Must be a valid email');
    expect(check({ format: 'email' }, 5).valid).toBe(true);
    expect(check({ format: 'int32' }, 2 ** 31).valid).toBe(false);
    expect(check({ format: 'int32' }, 'text').valid).toBe(true);
  });

  test('unregistered formats pass', () => {
    expect(check({ format: 'made-up' }, 'x').valid).toBe(true);
  });

  test('validateFormats: false turns formats off', () => {
    expect(check({ format: 'email' }, 'nope', { validateFormats: false }).valid).toBe(
      true
    );
  });

  test('custom registries replace the default set', () => {
    const formats = new FormatRegistry().registerString('upper', (value) =>
      value === value.toUpperCase()
    );
    expect(check({ format: 'upper' }, 'abc', { formats }).valid).toBe(false);
    expect(check({ format: 'email' }, 'nope', { formats }).valid).toBe(true);
  });
});
