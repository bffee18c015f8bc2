import yaml from 'js-yaml';

import { ErrorCode } from '../errors/codes.js';
import { ParseError } from '../errors/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { Json } from './json.js';
import { appendPointer } from './pointer.js';

export type SourceSyntax = 'json' | 'yaml';

/** Deepest array/object nesting a decoded value may have. */
export const MAX_NESTING_DEPTH = 500;

export interface DecodeOptions {
  syntax?: SourceSyntax;
  /** Where the input came from; carried into error context only. */
  source?: string;
  errorCode?: ErrorCode;
}

type RawInput = string | Uint8Array;

function isRawInput(input: unknown): input is RawInput {
  return typeof input === 'string' || input instanceof Uint8Array;
}

function toText(input: RawInput): string {
  const text =
    typeof input === 'string'
      ? input
      : new TextDecoder('utf-8', { fatal: true }).decode(input);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** 1-based line/column of a character offset. */
function locate(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const lines = before.split('\n');
  return { line: lines.length, column: (lines.at(-1)?.length ?? 0) + 1 };
}

function decodeJson(
  text: string,
  options: DecodeOptions
): Result<unknown, ParseError> {
  try {
    return ok(JSON.parse(text) as unknown);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const position = /position (\d+)/.exec(message);
    const where = position?.[1] ? locate(text, Number(position[1])) : {};
    return err(
      new ParseError({
        message: `Invalid JSON: ${message}`,
        errorCode: options.errorCode,
        context: { source: options.source, ...where },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

function decodeYaml(
  text: string,
  options: DecodeOptions
): Result<unknown, ParseError> {
  try {
    // JSON_SCHEMA keeps timestamps and other YAML-only scalars as strings
    return ok(yaml.load(text, { schema: yaml.JSON_SCHEMA }));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      return err(
        new ParseError({
          message: `Invalid YAML: ${error.reason}`,
          errorCode: options.errorCode,
          context: {
            source: options.source,
            line: error.mark.line + 1,
            column: error.mark.column + 1,
          },
          cause: error,
        })
      );
    }
    if (error instanceof RangeError) {
      return err(
        new ParseError({
          message: 'Invalid YAML: input is nested too deeply',
          errorCode: options.errorCode,
          context: { source: options.source },
          cause: error,
        })
      );
    }
    throw error;
  }
}

/**
 * Turn text or bytes into a decoded value. Anything else is assumed to be
 * decoded already and is passed through for the structural check.
 */
export function decodeInput(
  input: unknown,
  options: DecodeOptions = {}
): Result<unknown, ParseError> {
  if (!isRawInput(input)) return ok(input);
  let text: string;
  try {
    text = toText(input);
  } catch (error) {
    return err(
      new ParseError({
        message: 'Input is not valid UTF-8',
        errorCode: options.errorCode,
        context: { source: options.source },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
  return options.syntax === 'yaml'
    ? decodeYaml(text, options)
    : decodeJson(text, options);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

type Frame =
  | { kind: 'enter'; value: unknown; pointer: string; depth: number }
  | { kind: 'exit'; value: object };

/**
 * Check that a decoded value is plain JSON: no undefined, functions,
 * symbols, bigints, non-finite numbers, class instances or cycles, and no
 * nesting past MAX_NESTING_DEPTH.
 */
export function ensureJsonValue(
  value: unknown,
  options: DecodeOptions & { pointerKey?: 'path' | 'schemaPath' } = {}
): Result<Json, ParseError> {
  const pointerKey = options.pointerKey ?? 'path';
  const fail = (message: string, pointer: string): Result<Json, ParseError> =>
    err(
      new ParseError({
        message,
        errorCode: options.errorCode,
        context: { source: options.source, [pointerKey]: `#${pointer}` },
      })
    );

  const stack: Frame[] = [{ kind: 'enter', value, pointer: '', depth: 1 }];
  const ancestors = new Set<object>();

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (frame.kind === 'exit') {
      ancestors.delete(frame.value);
      continue;
    }
    const { value: node, pointer, depth } = frame;

    switch (typeof node) {
      case 'string':
      case 'boolean':
        continue;
      case 'number':
        if (!Number.isFinite(node)) {
          return fail(`Non-finite number ${String(node)} is not valid JSON`, pointer);
        }
        continue;
      case 'undefined':
        return fail('Undefined values are not valid JSON', pointer);
      case 'object':
        break;
      default:
        return fail(`Unsupported value of type "${typeof node}"`, pointer);
    }
    if (node === null) continue;

    if (ancestors.has(node)) {
      return fail('Circular structures cannot be represented as JSON', pointer);
    }
    if (depth > MAX_NESTING_DEPTH) {
      return fail(
        `Nesting deeper than ${MAX_NESTING_DEPTH} levels is not supported`,
        pointer
      );
    }

    if (Array.isArray(node)) {
      ancestors.add(node);
      stack.push({ kind: 'exit', value: node });
      for (let i = node.length - 1; i >= 0; i--) {
        stack.push({
          kind: 'enter',
          value: node[i] as unknown,
          pointer: appendPointer(pointer, i),
          depth: depth + 1,
        });
      }
      continue;
    }

    if (!isPlainObject(node)) {
      const name = node.constructor?.name ?? 'object';
      return fail(`Unsupported ${name} value; expected plain JSON`, pointer);
    }

    ancestors.add(node);
    stack.push({ kind: 'exit', value: node });
    const entries = Object.entries(node);
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (!entry) continue;
      stack.push({
        kind: 'enter',
        value: entry[1] as unknown,
        pointer: appendPointer(pointer, entry[0]),
        depth: depth + 1,
      });
    }
  }

  return ok(value as Json);
}
