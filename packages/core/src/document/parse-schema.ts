/* eslint-disable complexity */
import { ErrorCode } from '../errors/codes.js';
import { ParseError } from '../errors/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { decodeInput, ensureJsonValue, type SourceSyntax } from './decode.js';
import { type Json, type JsonObject, isJsonObject } from './json.js';
import {
  ARRAY_KEYWORDS,
  COMPOSITE_KEYWORDS,
  DATA_KEYWORDS,
  ENUM_KEYWORDS,
  OBJECT_KEYWORDS,
  SUBSCHEMA_KEYWORDS,
  SUBSCHEMA_LIST_KEYWORDS,
  SUBSCHEMA_MAP_KEYWORDS,
} from './keywords.js';
import { appendPointer, toFragment, type JsonPointer } from './pointer.js';
import {
  SchemaDocument,
  type KeywordSchemaNode,
  type SchemaNode,
} from './schema-node.js';

export interface ParseSchemaOptions {
  syntax?: SourceSyntax;
  source?: string;
}

/**
 * Positions reached through schema keywords are strict: a malformed keyword
 * there is a ParseError. Objects found under unknown keywords (`components`,
 * `x-*`, OpenAPI path items, …) are parsed leniently so that pointers into
 * them resolve; a malformed node there is simply left out of the arena.
 */
type Mode = 'strict' | 'lenient';

class MalformedSchema extends Error {
  constructor(
    message: string,
    readonly pointer: JsonPointer
  ) {
    super(message);
  }
}

function classify(
  keywords: ReadonlyMap<string, Json>
): KeywordSchemaNode['kind'] {
  const has = (list: readonly string[]): boolean =>
    list.some((keyword) => keywords.has(keyword));
  if (has(COMPOSITE_KEYWORDS)) return 'composite';
  if (has(ENUM_KEYWORDS)) return 'enum';
  if (has(OBJECT_KEYWORDS)) return 'object-shape';
  if (has(ARRAY_KEYWORDS)) return 'array-shape';
  return 'type-constraint';
}

function checkTypeKeyword(value: Json, pointer: JsonPointer): void {
  if (typeof value === 'string') return;
  if (Array.isArray(value) && value.every((entry) => typeof entry === 'string')) {
    return;
  }
  throw new MalformedSchema(
    '"type" must be a string or an array of strings',
    appendPointer(pointer, 'type')
  );
}

class ArenaBuilder {
  readonly nodes = new Map<JsonPointer, SchemaNode>();

  visit(value: Json, pointer: JsonPointer, mode: Mode): void {
    if (mode === 'strict') {
      this.visitSchema(value, pointer);
      return;
    }
    // A lenient node is built into a scratch builder first so that a
    // malformed subtree leaves nothing half-registered behind.
    const scratch = new ArenaBuilder();
    try {
      scratch.visitSchema(value, pointer);
    } catch (error) {
      if (error instanceof MalformedSchema) return;
      throw error;
    }
    for (const [key, node] of scratch.nodes) this.nodes.set(key, node);
  }

  private visitSchema(value: Json, pointer: JsonPointer): void {
    if (typeof value === 'boolean') {
      this.nodes.set(pointer, {
        kind: 'boolean-literal',
        pointer,
        value,
        keywords: new Map(),
      });
      return;
    }
    if (!isJsonObject(value)) {
      throw new MalformedSchema(
        'A schema must be an object or a boolean',
        pointer
      );
    }

    const keywords = new Map<string, Json>(Object.entries(value));
    const type = keywords.get('type');
    if (type !== undefined) checkTypeKeyword(type, pointer);

    const ref = keywords.get('$ref');
    if (ref !== undefined && typeof ref !== 'string') {
      throw new MalformedSchema(
        '"$ref" must be a string',
        appendPointer(pointer, '$ref')
      );
    }

    this.nodes.set(
      pointer,
      typeof ref === 'string'
        ? { kind: 'reference', pointer, keywords, refTarget: ref }
        : { kind: classify(keywords), pointer, keywords }
    );

    for (const [keyword, child] of keywords) {
      this.visitKeyword(keyword, child, appendPointer(pointer, keyword));
    }
  }

  private visitKeyword(keyword: string, value: Json, pointer: JsonPointer): void {
    if (DATA_KEYWORDS.has(keyword)) return;

    if (SUBSCHEMA_KEYWORDS.has(keyword)) {
      this.visitSchema(value, pointer);
      return;
    }

    if (SUBSCHEMA_LIST_KEYWORDS.has(keyword) || keyword === 'items') {
      if (keyword === 'items' && !Array.isArray(value)) {
        this.visitSchema(value, pointer);
        return;
      }
      if (!Array.isArray(value) || value.length === 0) {
        throw new MalformedSchema(
          `"${keyword}" must be a non-empty array of schemas`,
          pointer
        );
      }
      value.forEach((entry, index) => {
        this.visitSchema(entry, appendPointer(pointer, index));
      });
      return;
    }

    if (SUBSCHEMA_MAP_KEYWORDS.has(keyword) || keyword === 'dependencies') {
      if (!isJsonObject(value)) {
        throw new MalformedSchema(`"${keyword}" must be an object`, pointer);
      }
      for (const [name, entry] of Object.entries(value)) {
        // draft-04..07 `dependencies` mixes schemas and property-name lists
        if (keyword === 'dependencies' && Array.isArray(entry)) continue;
        this.visitSchema(entry, appendPointer(pointer, name));
      }
      return;
    }

    if (isJsonObject(value)) {
      this.visit(value, pointer, 'lenient');
    }
  }
}

function stringMember(object: JsonObject, key: string): string | undefined {
  const value = Object.prototype.hasOwnProperty.call(object, key)
    ? object[key]
    : undefined;
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build a SchemaDocument from raw input (text, bytes or a decoded value).
 * Parsing is structural only: keyword values are checked just far enough to
 * classify nodes.
 */
export function parseSchema(
  raw: unknown,
  options: ParseSchemaOptions = {}
): Result<SchemaDocument, ParseError> {
  const decodeOptions = {
    ...options,
    errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
  };
  const decoded = decodeInput(raw, decodeOptions);
  if (decoded.isErr()) return decoded;

  const checked = ensureJsonValue(decoded.value, {
    ...decodeOptions,
    pointerKey: 'schemaPath',
  });
  if (checked.isErr()) return checked;
  const value = checked.value;

  const builder = new ArenaBuilder();
  try {
    builder.visit(value, '', 'strict');
  } catch (error) {
    if (error instanceof MalformedSchema) {
      return err(
        new ParseError({
          message: error.message,
          errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
          context: {
            source: options.source,
            schemaPath: toFragment(error.pointer),
          },
        })
      );
    }
    throw error;
  }

  const rootObject = isJsonObject(value) ? value : undefined;
  const declaredDialect = rootObject
    ? (stringMember(rootObject, '$schema') ??
      stringMember(rootObject, 'openapi') ??
      stringMember(rootObject, 'swagger'))
    : undefined;
  const id = rootObject ? stringMember(rootObject, '$id') : undefined;

  return ok(new SchemaDocument(value, builder.nodes, declaredDialect, id));
}
