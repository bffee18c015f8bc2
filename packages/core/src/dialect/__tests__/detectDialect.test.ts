import { describe, expect, test } from 'vitest';
import {
  detectDialect,
  dialectFromMetaUri,
  dialectFromOpenApiVersion,
  isDialect,
} from '../detectDialect.js';
import { getProfile } from '../profiles.js';
import { schemaOf } from '../../test-utils/harness.js';

describe('detectDialect', () => {
  test('reads $schema, with or without fragment and scheme variants', () => {
    expect(detectDialect({ $schema: 'http://json-schema.org/draft-04/schema#' })).toBe(
      'draft-04'
    );
    expect(detectDialect({ $schema: 'https://json-schema.org/draft-07/schema' })).toBe(
      'draft-07'
    );
    expect(
      detectDialect({ $schema: 'https://json-schema.org/draft/2019-09/schema' })
    ).toBe('2019-09');
  });

  test('reads OpenAPI and Swagger version fields', () => {
    expect(detectDialect({ openapi: '3.0.3' })).toBe('openapi-3.0');
    expect(detectDialect({ openapi: '3.1.0' })).toBe('openapi-3.1');
    expect(detectDialect({ swagger: '2.0' })).toBe('openapi-3.0');
  });

  test('falls back to keyword features', () => {
    expect(detectDialect({ prefixItems: [true] })).toBe('2020-12');
    expect(detectDialect({ properties: { a: { nullable: true } } })).toBe(
      'openapi-3.0'
    );
    expect(detectDialect({ $defs: {} })).toBe('2020-12');
    expect(detectDialect({ if: true, then: true })).toBe('draft-07');
    expect(detectDialect({ type: 'string' })).toBe('2020-12');
    expect(detectDialect(true)).toBe('2020-12');
  });

  test('array-valued items means draft-07 tuples, or 2019-09 next to $defs', () => {
    expect(detectDialect({ items: [{ type: 'string' }] })).toBe('draft-07');
    expect(detectDialect({ $defs: {}, items: [true] })).toBe('2019-09');
  });

  test('nullable picks OpenAPI 3.0 only when no newer keyword is in use', () => {
    const schema = {
      properties: {
        a: { type: 'string', nullable: true },
        kind: { const: 'x' },
      },
    };
    expect(detectDialect(schema)).toBe('draft-07');
    expect(
      detectDialect({ properties: { a: { nullable: true }, b: { contains: {} } } })
    ).toBe('2020-12');
  });

  test('ignores keywords inside instance data', () => {
    expect(detectDialect({ enum: [{ nullable: true }] })).toBe('2020-12');
    expect(detectDialect({ examples: [{ const: 1, if: true }] })).toBe('2020-12');
    expect(detectDialect({ default: { prefixItems: [true] } })).toBe('2020-12');
  });

  test('accepts a parsed document', () => {
    expect(detectDialect(schemaOf({ properties: { a: { nullable: true } } }))).toBe(
      'openapi-3.0'
    );
    expect(detectDialect(schemaOf({ openapi: '3.1.0' }))).toBe('openapi-3.1');
  });

  test('helpers', () => {
    expect(dialectFromMetaUri('urn:unknown')).toBeUndefined();
    expect(dialectFromOpenApiVersion('4.0')).toBeUndefined();
    expect(dialectFromMetaUri('https://json-schema.org/draft-06/schema#')).toBe(
      'draft-06'
    );
    expect(isDialect('draft-07')).toBe(true);
    expect(isDialect('draft-3')).toBe(false);
  });
});

describe('keyword profiles', () => {
  test('exclusive bounds and $ref siblings follow the dialect', () => {
    expect(getProfile('draft-04').exclusiveBounds).toBe('boolean');
    expect(getProfile('draft-07').exclusiveBounds).toBe('numeric');
    expect(getProfile('draft-07').refSiblings).toBe('ignore');
    expect(getProfile('2020-12').refSiblings).toBe('evaluate');
  });

  test('tuple keyword and nullable', () => {
    expect(getProfile('2020-12').tupleKeyword).toBe('prefixItems');
    expect(getProfile('draft-07').tupleKeyword).toBe('items');
    expect(getProfile('openapi-3.0').nullable).toBe(true);
    expect(getProfile().dialect).toBe('2020-12');
  });

  test('dependency keywords per dialect', () => {
    expect(getProfile('draft-07').ignoredKeywords.has('dependentRequired')).toBe(true);
    expect(getProfile('2020-12').ignoredKeywords.has('dependencies')).toBe(true);
    expect(getProfile('draft-04').ignoredKeywords.has('if')).toBe(true);
  });
});
