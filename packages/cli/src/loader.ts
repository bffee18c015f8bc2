import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  InputNotFoundError,
  ParseError,
  err,
  ok,
  parseInstance,
  parseSchema,
  type Instance,
  type Result,
  type SchemaDocument,
  type ShapecheckError,
  type SourceSyntax,
} from '@shapecheck/core';

/** Syntax of a file: the explicit flag wins, otherwise the extension decides. */
export function syntaxOf(
  file: string,
  explicit?: SourceSyntax
): Result<SourceSyntax, ParseError> {
  if (explicit) return ok<SourceSyntax>(explicit);
  const extension = path.extname(file).slice(1).toLowerCase();
  if (extension === 'json') return ok<SourceSyntax>('json');
  if (extension === 'yaml' || extension === 'yml') return ok<SourceSyntax>('yaml');
  return err(
    new ParseError({
      message: `Unsupported file type: ${extension || '(none)'}. Must be json or yaml/yml.`,
      context: {
        source: file,
        suggestion: 'Pass --schema_type or --data_type to name the syntax',
      },
    })
  );
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  );
}

export async function readSource(
  file: string
): Promise<Result<Uint8Array, InputNotFoundError>> {
  try {
    return ok(await readFile(file));
  } catch (error) {
    if (isMissingFile(error)) return err(new InputNotFoundError(file));
    throw error;
  }
}

export async function loadSchema(
  file: string,
  syntax?: SourceSyntax
): Promise<Result<SchemaDocument, ShapecheckError>> {
  const resolved = syntaxOf(file, syntax);
  if (resolved.isErr()) return resolved;
  const raw = await readSource(file);
  if (raw.isErr()) return raw;
  return parseSchema(raw.value, { syntax: resolved.value, source: file });
}

export async function loadInstance(
  file: string,
  syntax?: SourceSyntax
): Promise<Result<Instance, ShapecheckError>> {
  const resolved = syntaxOf(file, syntax);
  if (resolved.isErr()) return resolved;
  const raw = await readSource(file);
  if (raw.isErr()) return raw;
  return parseInstance(raw.value, { syntax: resolved.value, source: file });
}
