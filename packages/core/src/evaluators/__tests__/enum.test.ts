import { describe, expect, test } from 'vitest';
import { check } from '../../test-utils/harness.js';

describe('enum evaluator', () => {
  test('uses structural equality', () => {
    const schema = { enum: [1, 'a', { x: [1] }] };
    expect(check(schema, { x: [1] }).valid).toBe(true);
    expect(check(schema, 1.0).valid).toBe(true);
    const result = check(schema, 2);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.message).toBe(
      'Value must be one of 1, "a", {"x":[1]}'
    );
    expect(result.failures[0]?.details).toEqual({ allowed: [1, 'a', { x: [1] }] });
  });

  test('const', () => {
    const schema = { const: { a: 1 } };
    expect(check(schema, { a: 1 }).valid).toBe(true);
    const result = check(schema, { a: 2 });
    expect(result.failures[0]?.kind).toBe('const');
    expect(result.failures[0]?.schemaPath).toEqual(['const']);
  });

  test('a non-array enum is a structural failure', () => {
    const result = check({ enum: 'a' }, 'a');
    expect(result.failures[0]?.kind).toBe('invalid-keyword');
    expect(result.failures[0]?.category).toBe('structural');
  });
});
