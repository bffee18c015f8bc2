import { describe, expect, test } from 'vitest';
import type { SchemaDocument } from '../../document/schema-node.js';
import { parseSchema } from '../../document/parse-schema.js';
import { DocumentRegistry } from '../registry.js';
import {
  ReferenceResolver,
  createResolutionContext,
} from '../reference-resolver.js';

function doc(raw: unknown): SchemaDocument {
  const result = parseSchema(raw);
  if (result.isErr()) throw result.error;
  return result.value;
}

describe('ReferenceResolver', () => {
  test('resolves local pointers to arena nodes', () => {
    const schema = doc({ $defs: { id: { type: 'integer' } } });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const result = resolver.resolve('#/$defs/id', schema, createResolutionContext());
    expect(result.status).toBe('resolved');
    if (result.status === 'resolved') {
      expect(result.node.pointer).toBe('/$defs/id');
      expect(result.via).toEqual(['#/$defs/id']);
    }
  });

  test('follows alias chains and records every hop', () => {
    const schema = doc({
      $defs: {
        a: { $ref: '#/$defs/b' },
        b: { $ref: '#/$defs/c' },
        c: { type: 'string' },
      },
    });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const result = resolver.resolve('#/$defs/a', schema, createResolutionContext());
    expect(result.status === 'resolved' && result.via).toEqual([
      '#/$defs/a',
      '#/$defs/b',
      '#/$defs/c',
    ]);
  });

  test('a reference node with siblings is not chased', () => {
    const schema = doc({
      $defs: { a: { $ref: '#/$defs/b', minLength: 1 }, b: { type: 'string' } },
    });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const result = resolver.resolve('#/$defs/a', schema, createResolutionContext());
    expect(result.status === 'resolved' && result.node.pointer).toBe('/$defs/a');
  });

  test('an alias cycle yields the recursive sentinel', () => {
    const schema = doc({
      $defs: { a: { $ref: '#/$defs/b' }, b: { $ref: '#/$defs/a' } },
    });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const ctx = createResolutionContext();
    const result = resolver.resolve('#/$defs/a', schema, ctx);
    expect(result.status).toBe('recursive');
    if (result.status === 'recursive') {
      expect(result.pointer).toBe('/$defs/a');
      expect(result.via).toEqual(['#/$defs/a', '#/$defs/b', '#/$defs/a']);
    }
    expect(ctx.chain).toEqual([]);
  });

  test('memoizes per context', () => {
    const schema = doc({ $defs: { id: { type: 'integer' } } });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const ctx = createResolutionContext();
    const first = resolver.resolve('#/$defs/id', schema, ctx);
    expect(resolver.resolve('#/$defs/id', schema, ctx)).toBe(first);
    expect(ctx.cache.size).toBe(1);
  });

  test('reports what could not be resolved', () => {
    const schema = doc({ $defs: { list: { enum: [1] } } });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const ctx = createResolutionContext();

    const missing = resolver.resolve('#/$defs/nope', schema, ctx);
    expect(missing.status === 'unresolved' && missing.reason).toBe(
      'nothing exists at "#/$defs/nope"'
    );
    const data = resolver.resolve('#/$defs/list/enum', schema, ctx);
    expect(data.status === 'unresolved' && data.reason).toBe(
      '"#/$defs/list/enum" does not hold a schema'
    );
    const remote = resolver.resolve('other.json#/a', schema, ctx);
    expect(remote.status === 'unresolved' && remote.reason).toBe(
      'document "other.json" is not registered'
    );
    const malformed = resolver.resolve('#nope', schema, ctx);
    expect(malformed.status === 'unresolved' && malformed.reason).toBe(
      '"#nope" is not a JSON Pointer fragment'
    );
  });

  test('resolves into registered documents and from them back home', () => {
    const common = doc({
      $defs: { id: { type: 'integer' }, ref: { $ref: '#/$defs/id' } },
    });
    const main = doc({ $ref: 'common.json#/$defs/ref' });
    const registry = new DocumentRegistry();
    registry.add('common.json', common);
    const resolver = new ReferenceResolver(registry);

    const result = resolver.resolve('common.json#/$defs/ref', main, createResolutionContext());
    expect(result.status).toBe('resolved');
    if (result.status === 'resolved') {
      expect(result.document).toBe(common);
      expect(result.node.pointer).toBe('/$defs/id');
    }
    expect(registry.uris()).toEqual(['common.json']);
    expect(registry.keyOf(main)).toBe('');
  });

  test('a document is addressable by its own $id', () => {
    const schema = doc({
      $id: 'https://example.test/s.json',
      $defs: { n: { type: 'number' } },
    });
    const resolver = new ReferenceResolver(new DocumentRegistry());
    const result = resolver.resolve(
      'https://example.test/s.json#/$defs/n',
      schema,
      createResolutionContext()
    );
    expect(result.status).toBe('resolved');
  });
});
