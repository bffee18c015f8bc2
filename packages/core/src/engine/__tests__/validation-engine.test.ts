import { describe, expect, test } from 'vitest';
import type { Instance, Json, JsonObject } from '../../document/json.js';
import type { ConstraintEvaluator } from '../../evaluators/types.js';
import { failure } from '../../evaluators/scope.js';
import { ConfigurationError, LimitExceededError } from '../../errors/errors.js';
import { brief, schemaOf } from '../../test-utils/harness.js';
import { ValidationEngine, validate } from '../validation-engine.js';

const record = schemaOf({
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer' },
    tag: { enum: ['a', 'b'] },
  },
});

describe('ValidationEngine', () => {
  test('reports every violation, each at its own location', () => {
    const result = validate(record, { id: 1.5, tag: 'c' });
    expect(result.valid).toBe(false);
    expect(result.failures.map(brief)).toEqual([
      { kind: 'type', instancePath: ['id'], schemaPath: ['properties', 'id', 'type'] },
      { kind: 'enum', instancePath: ['tag'], schemaPath: ['properties', 'tag', 'enum'] },
    ]);
  });

  test('a missing required property is reported at the object', () => {
    const result = validate(record, { tag: 'a' });
    expect(result.failures.map(brief)).toEqual([
      { kind: 'required', instancePath: [], schemaPath: ['required'] },
    ]);
  });

  test('valid instances produce no failures', () => {
    expect(validate(record, { id: 7, tag: 'b' })).toEqual({ valid: true, failures: [] });
  });

  test('false and true schemas', () => {
    expect(validate(schemaOf(true), { anything: 1 }).valid).toBe(true);
    expect(validate(schemaOf(false), null).failures.map(brief)).toEqual([
      { kind: 'false-schema', instancePath: [], schemaPath: [] },
    ]);
  });

  test('unknown keywords are ignored', () => {
    expect(validate(schemaOf({ 'x-internal': true, title: 'T' }), 1).valid).toBe(true);
  });

  test('running out of steps aborts the call', () => {
    const schema = schemaOf({ properties: { a: {}, b: {}, c: {} } });
    const engine = new ValidationEngine({ maxSteps: 3 });
    expect(() => engine.validate(schema, { a: 1, b: 1, c: 1 })).toThrow(
      LimitExceededError
    );
    expect(engine.validate(schema, { a: 1, b: 1 }).valid).toBe(true);
  });

  test('validateBatch keeps order and isolates aborts', () => {
    const schema = schemaOf({ properties: { a: {}, b: {}, c: {} }, required: ['a'] });
    const engine = new ValidationEngine({ maxSteps: 3 });
    const instances: Instance[] = [{ a: 1 }, { a: 1, b: 1, c: 1 }, {}];
    const verdicts = engine.validateBatch(schema, instances);
    expect(verdicts.map((v) => [v.index, v.status])).toEqual([
      [0, 'valid'],
      [1, 'aborted'],
      [2, 'invalid'],
    ]);
    const aborted = verdicts[1];
    expect(aborted?.status === 'aborted' && aborted.error.limit).toBe(3);
  });

  test('nested anyOf blow-up ends in LimitExceededError', () => {
    // every level offers two copies of the next, so a miss visits 2^16 leaves
    const defs: JsonObject = { l16: { type: 'string' } };
    for (let level = 0; level < 16; level++) {
      const next = { $ref: `#/$defs/l${level + 1}` };
      defs[`l${level}`] = { anyOf: [next, next] };
    }
    const schema = schemaOf({ $defs: defs, $ref: '#/$defs/l0' });
    const engine = new ValidationEngine({ maxSteps: 10_000 });

    expect(engine.validate(schema, 'ok').valid).toBe(true);
    expect(() => engine.validate(schema, 1)).toThrow(
      'Validation aborted after 10000 evaluation steps'
    );
    expect(engine.validateBatch(schema, ['ok', 1]).map((v) => v.status)).toEqual([
      'valid',
      'aborted',
    ]);
  });

  test('deeply nested instances produce verdicts instead of crashing', () => {
    let deep: Json = [];
    for (let i = 0; i < 20000; i++) deep = [deep];
    const engine = new ValidationEngine();
    const verdicts = engine.validateBatch(schemaOf({ uniqueItems: true }), [
      [deep, deep],
      [deep, []],
    ]);
    expect(verdicts.map((v) => v.status)).toEqual(['invalid', 'valid']);
    const first = verdicts[0];
    expect(first?.status === 'invalid' && first.result.failures.map(brief)).toEqual([
      { kind: 'unique-items', instancePath: [], schemaPath: ['uniqueItems'] },
    ]);
  });

  test('validates against a fragment of an OpenAPI document', () => {
    const api = schemaOf({
      openapi: '3.0.3',
      components: {
        schemas: {
          Pet: { type: 'object', required: ['name'] },
        },
      },
    });
    const engine = new ValidationEngine();
    const result = engine.validate(api, {}, { pointer: '#/components/schemas/Pet' });
    expect(result.failures.map(brief)).toEqual([
      {
        kind: 'required',
        instancePath: [],
        schemaPath: ['components', 'schemas', 'Pet', 'required'],
      },
    ]);
    expect(() =>
      engine.validate(api, {}, { pointer: '#/components/schemas/Cat' })
    ).toThrow(ConfigurationError);
  });

  test('references into registered documents', () => {
    const common = schemaOf({ $defs: { id: { type: 'integer' } } });
    const main = schemaOf({ properties: { id: { $ref: 'common.json#/$defs/id' } } });
    const engine = new ValidationEngine().registerDocument('common.json', common);
    expect(engine.validate(main, { id: 'x' }).failures.map(brief)).toEqual([
      {
        kind: 'type',
        instancePath: ['id'],
        schemaPath: ['properties', 'id', '$ref', 'common.json#/$defs/id', 'type'],
      },
    ]);
    expect(validate(main, { id: 'x' }).failures[0]?.kind).toBe('unresolved-reference');
  });

  test('an explicit dialect overrides detection', () => {
    const schema = schemaOf({ type: 'string', nullable: true });
    expect(new ValidationEngine().dialectOf(schema)).toBe('openapi-3.0');
    const engine = new ValidationEngine({ dialect: 'draft-07' });
    expect(engine.dialectOf(schema)).toBe('draft-07');
    expect(engine.validate(schema, null).valid).toBe(false);
  });

  test('extra evaluators handle keywords the built-ins do not own', () => {
    const even: ConstraintEvaluator = {
      name: 'even',
      keywords: ['even'],
      evaluate(node, instance, scope) {
        if (node.keywords.get('even') !== true) return [];
        if (typeof instance !== 'number' || instance % 2 === 0) return [];
        return [failure(scope, 'even', 'multiple-of', 'Must be even')];
      },
    };
    const engine = new ValidationEngine({ evaluators: [even] });
    const schema = schemaOf({ items: { even: true } });
    expect(engine.validate(schema, [2, 3]).failures.map(brief)).toEqual([
      { kind: 'multiple-of', instancePath: [1], schemaPath: ['items', 'even'] },
    ]);
  });

  test('results are deterministic', () => {
    const instance = { id: 'x', tag: 'z', extra: [1, 2] };
    expect(validate(record, instance)).toEqual(validate(record, instance));
  });
});
