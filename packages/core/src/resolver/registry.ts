import type { SchemaDocument } from '../document/schema-node.js';

/**
 * Documents that `$ref` values may point into by URI
 * (`common.json#/$defs/Id`). The document under validation is addressed
 * with the empty URI.
 */
export class DocumentRegistry {
  private readonly byUri = new Map<string, SchemaDocument>();
  private readonly uriByDocument = new WeakMap<SchemaDocument, string>();

  add(uri: string, document: SchemaDocument): void {
    const key = stripFragment(uri);
    this.byUri.set(key, document);
    this.uriByDocument.set(document, key);
  }

  get(uri: string): SchemaDocument | undefined {
    return this.byUri.get(stripFragment(uri));
  }

  /** Registered URI of a document; '' for documents never registered. */
  keyOf(document: SchemaDocument): string {
    return this.uriByDocument.get(document) ?? '';
  }

  uris(): string[] {
    return Array.from(this.byUri.keys()).sort();
  }

  get size(): number {
    return this.byUri.size;
  }
}

export function stripFragment(uri: string): string {
  const idx = uri.indexOf('#');
  return idx >= 0 ? uri.slice(0, idx) : uri;
}
