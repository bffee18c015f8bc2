import type { PathSegment } from './json.js';

/**
 * JSON Pointer helpers (RFC 6901).
 *
 * Internally a pointer is the plain form: '' for the root, '/a/0' below it.
 * Reference strings use the URI fragment form ('#', '#/a/0'), which is
 * additionally percent-encoded.
 */
export type JsonPointer = string;

export function escapeSegment(segment: PathSegment): string {
  return String(segment).replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function appendPointer(
  base: JsonPointer,
  ...segments: PathSegment[]
): JsonPointer {
  let pointer = base;
  for (const segment of segments) {
    pointer += `/${escapeSegment(segment)}`;
  }
  return pointer;
}

export function encodePointer(segments: readonly PathSegment[]): JsonPointer {
  return appendPointer('', ...segments);
}

/** Fragment form used in `$ref` values and in reports. */
export function toFragment(pointer: JsonPointer): string {
  return `#${pointer}`;
}

/**
 * Split a pointer (plain or fragment form) into unescaped segments.
 * Returns undefined when the pointer is malformed.
 */
export function decodePointer(pointer: string): string[] | undefined {
  let plain = pointer;
  if (plain.startsWith('#')) {
    try {
      plain = decodeURIComponent(plain.slice(1));
    } catch {
      return undefined;
    }
  }
  if (plain === '') return [];
  if (!plain.startsWith('/')) return undefined;
  const raw = plain.slice(1).split('/');
  for (const segment of raw) {
    if (/~(?![01])/.test(segment)) return undefined;
  }
  return raw.map(unescapeSegment);
}

/** Canonical plain form of a pointer, or undefined when it is malformed. */
export function normalizePointer(pointer: string): JsonPointer | undefined {
  const segments = decodePointer(pointer);
  return segments ? encodePointer(segments) : undefined;
}

/**
 * Split a `$ref` value into its document part and its fragment pointer.
 * `other.json#/a` → { uri: 'other.json', fragment: '#/a' };
 * `#/a` → { uri: '', fragment: '#/a' }.
 */
export function splitReference(ref: string): { uri: string; fragment: string } {
  const hash = ref.indexOf('#');
  if (hash === -1) return { uri: ref, fragment: '#' };
  return { uri: ref.slice(0, hash), fragment: ref.slice(hash) };
}
