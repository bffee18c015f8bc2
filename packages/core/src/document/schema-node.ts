import type { Json } from './json.js';
import { appendPointer, type JsonPointer } from './pointer.js';
import type { PathSegment } from './json.js';

/**
 * Coarse shape of a node. Only `reference` and `boolean-literal` change how
 * the engine evaluates a node; the other kinds are informational, and
 * keywords are dispatched to evaluators by ownership whatever the kind.
 */
export type SchemaNodeKind =
  | 'type-constraint'
  | 'enum'
  | 'composite'
  | 'object-shape'
  | 'array-shape'
  | 'reference'
  | 'boolean-literal';

interface SchemaNodeBase {
  /** Location of the node inside its document ('' for the root). */
  readonly pointer: JsonPointer;
  /** Every keyword of the node in declaration order, unknown ones included. */
  readonly keywords: ReadonlyMap<string, Json>;
}

export interface BooleanSchemaNode extends SchemaNodeBase {
  readonly kind: 'boolean-literal';
  readonly value: boolean;
}

export interface ReferenceSchemaNode extends SchemaNodeBase {
  readonly kind: 'reference';
  /** Raw `$ref` value; resolved by pointer string, never by object identity. */
  readonly refTarget: string;
}

export interface KeywordSchemaNode extends SchemaNodeBase {
  readonly kind: Exclude<SchemaNodeKind, 'boolean-literal' | 'reference'>;
}

export type SchemaNode = BooleanSchemaNode | ReferenceSchemaNode | KeywordSchemaNode;

/**
 * A parsed schema document: the raw JSON plus an arena of SchemaNodes keyed
 * by pointer. Read-only once built, so one document can back any number of
 * validations at the same time.
 */
export class SchemaDocument {
  constructor(
    readonly raw: Json,
    private readonly arena: ReadonlyMap<JsonPointer, SchemaNode>,
    /** `$schema` or `openapi` marker found at the root, if any. */
    readonly declaredDialect?: string,
    /** `$id` of the root, if any. */
    readonly id?: string
  ) {}

  get root(): SchemaNode {
    const root = this.arena.get('');
    if (!root) {
      throw new Error('SchemaDocument has no root node');
    }
    return root;
  }

  get size(): number {
    return this.arena.size;
  }

  node(pointer: JsonPointer): SchemaNode | undefined {
    return this.arena.get(pointer);
  }

  child(node: SchemaNode, ...segments: PathSegment[]): SchemaNode | undefined {
    return this.arena.get(appendPointer(node.pointer, ...segments));
  }

  /** Every schema node of the document, in parse order. */
  nodes(): IterableIterator<SchemaNode> {
    return this.arena.values();
  }
}
