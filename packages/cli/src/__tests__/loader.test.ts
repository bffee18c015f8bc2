import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ErrorCode } from '@shapecheck/core';

import { loadInstance, loadSchema, syntaxOf } from '../loader.js';

let dir = '';

beforeAll(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'shapecheck-loader-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function fixture(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content, 'utf8');
  return file;
}

describe('syntaxOf', () => {
  it('infers the syntax from the extension', () => {
    expect(syntaxOf('a/b.JSON').unwrap()).toBe('json');
    expect(syntaxOf('b.yml').unwrap()).toBe('yaml');
    expect(syntaxOf('b.yaml').unwrap()).toBe('yaml');
  });

  it('prefers the explicit syntax', () => {
    expect(syntaxOf('body.txt', 'yaml').unwrap()).toBe('yaml');
  });

  it('fails on other extensions', () => {
    const result = syntaxOf('body.txt');
    expect(result.isErr() && result.error.message).toBe(
      'Unsupported file type: txt. Must be json or yaml/yml.'
    );
    const none = syntaxOf('Makefile');
    expect(none.isErr() && none.error.message).toBe(
      'Unsupported file type: (none). Must be json or yaml/yml.'
    );
  });
});

describe('loadInstance / loadSchema', () => {
  it('reads YAML without turning dates into objects', async () => {
    const file = await fixture('body.yaml', 'name: Ada\nborn: 1815-12-10\n');
    const result = await loadInstance(file);
    expect(result.unwrap()).toEqual({ name: 'Ada', born: '1815-12-10' });
  });

  it('reports a missing file as InputNotFound', async () => {
    const file = path.join(dir, 'missing.json');
    const result = await loadInstance(file);
    expect(result.isErr() && result.error.errorCode).toBe(
      ErrorCode.INPUT_NOT_FOUND
    );
    expect(result.isErr() && result.error.message).toBe(
      `File not found: ${file}`
    );
  });

  it('tags schema decode errors with the schema code and source', async () => {
    const file = await fixture('schema.json', '{"type": }');
    const result = await loadSchema(file);
    expect(result.isErr() && result.error.errorCode).toBe(
      ErrorCode.SCHEMA_PARSE_FAILED
    );
    expect(result.isErr() && result.error.context?.source).toBe(file);
  });

  it('builds a schema document', async () => {
    const file = await fixture('schema.yml', 'type: object\nrequired: [id]\n');
    const document = (await loadSchema(file)).unwrap();
    expect(document.root.kind).toBe('object-shape');
  });
});
