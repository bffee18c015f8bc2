/**
 * JSON Schema Reference Resolver
 * Resolves `$ref` strings into arena nodes with memoization and cycle
 * detection. Never follows object identity: targets are looked up by
 * pointer string in the owning document.
 */

import { type Json, hasOwn, isJsonObject } from '../document/json.js';
import { decodePointer, encodePointer, splitReference } from '../document/pointer.js';
import type {
  ReferenceSchemaNode,
  SchemaDocument,
  SchemaNode,
} from '../document/schema-node.js';
import { type DocumentRegistry, stripFragment } from './registry.js';

export type ResolvedReference =
  | {
      readonly status: 'resolved';
      readonly node: SchemaNode;
      readonly document: SchemaDocument;
      /** Reference strings followed to get here, the first one included. */
      readonly via: readonly string[];
    }
  | {
      /**
       * The pointer was already being resolved: a structural cycle made of
       * references only. The engine re-enters the node at `pointer`
       * without resolving again, bounded by its depth limit.
       */
      readonly status: 'recursive';
      readonly pointer: string;
      readonly document: SchemaDocument;
      readonly via: readonly string[];
    }
  | {
      readonly status: 'unresolved';
      readonly ref: string;
      readonly reason: string;
    };

/**
 * Per-call resolution state. Created by the engine for each top-level
 * validate call and discarded afterwards.
 */
export interface ResolutionContext {
  /** Keys of the references currently being resolved, innermost last. */
  readonly chain: string[];
  readonly cache: Map<string, ResolvedReference>;
}

export function createResolutionContext(): ResolutionContext {
  return { chain: [], cache: new Map() };
}

function locate(root: Json, segments: readonly string[]): boolean {
  let cursor: Json | undefined = root;
  for (const segment of segments) {
    if (Array.isArray(cursor)) {
      if (!/^(0|[1-9]\d*)$/.test(segment)) return false;
      cursor = cursor[Number(segment)];
    } else if (isJsonObject(cursor) && hasOwn(cursor, segment)) {
      cursor = cursor[segment];
    } else {
      return false;
    }
    if (cursor === undefined) return false;
  }
  return true;
}

/** Alias nodes (`{ "$ref": … }` and nothing else) are followed through. */
function isAlias(node: SchemaNode): node is ReferenceSchemaNode {
  return node.kind === 'reference' && node.keywords.size === 1;
}

export class ReferenceResolver {
  constructor(private readonly registry: DocumentRegistry) {}

  resolve(
    ref: string,
    from: SchemaDocument,
    ctx: ResolutionContext
  ): ResolvedReference {
    const { uri, fragment } = splitReference(ref);
    const document = this.#documentFor(uri, from);
    if (!document) {
      return {
        status: 'unresolved',
        ref,
        reason: `document "${uri}" is not registered`,
      };
    }

    const segments = decodePointer(fragment);
    if (!segments) {
      return {
        status: 'unresolved',
        ref,
        reason: `"${fragment}" is not a JSON Pointer fragment`,
      };
    }
    const pointer = encodePointer(segments);
    const key = `${this.registry.keyOf(document)}#${pointer}`;

    const cached = ctx.cache.get(key);
    if (cached) return this.#withVia(cached, ref);

    if (ctx.chain.includes(key)) {
      return { status: 'recursive', pointer, document, via: [ref] };
    }

    ctx.chain.push(key);
    let result: ResolvedReference;
    try {
      result = this.#walk(ref, document, pointer, segments, ctx);
    } finally {
      ctx.chain.pop();
    }
    ctx.cache.set(key, result);
    return result;
  }

  #walk(
    ref: string,
    document: SchemaDocument,
    pointer: string,
    segments: readonly string[],
    ctx: ResolutionContext
  ): ResolvedReference {
    if (!locate(document.raw, segments)) {
      return {
        status: 'unresolved',
        ref,
        reason: `nothing exists at "#${pointer}"`,
      };
    }
    const node = document.node(pointer);
    if (!node) {
      return {
        status: 'unresolved',
        ref,
        reason: `"#${pointer}" does not hold a schema`,
      };
    }
    if (!isAlias(node)) {
      return { status: 'resolved', node, document, via: [ref] };
    }

    const next = this.resolve(node.refTarget, document, ctx);
    if (next.status === 'unresolved') return next;
    return { ...next, via: [ref, ...next.via] };
  }

  #documentFor(uri: string, from: SchemaDocument): SchemaDocument | undefined {
    if (uri === '') return from;
    if (from.id !== undefined && stripFragment(from.id) === uri) return from;
    return this.registry.get(uri);
  }

  /** A cached resolution reached through a different spelling of the ref. */
  #withVia(cached: ResolvedReference, ref: string): ResolvedReference {
    if (cached.status === 'unresolved' || cached.via[0] === ref) return cached;
    return { ...cached, via: [ref, ...cached.via.slice(1)] };
  }
}
