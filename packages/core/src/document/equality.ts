import { type Json, hasOwn, isJsonObject } from './json.js';

/**
 * Structural equality: same keys and values for objects, same elements in
 * order for arrays. Numbers compare by value, so 1 and 1.0 are equal.
 * Walks with an explicit stack, so nesting depth is not bounded by the call stack.
 */
export function deepEqual(a: Json, b: Json): boolean {
  const pending: Array<[Json, Json]> = [[a, b]];

  while (pending.length > 0) {
    const pair = pending.pop();
    if (!pair) break;
    const [left, right] = pair;

    if (left === right) continue;
    if (typeof left !== 'object' || typeof right !== 'object') return false;
    if (left === null || right === null) return false;

    if (Array.isArray(left)) {
      if (!Array.isArray(right) || left.length !== right.length) return false;
      for (let i = 0; i < left.length; i++) {
        pending.push([left[i] ?? null, right[i] ?? null]);
      }
      continue;
    }
    if (Array.isArray(right) || !isJsonObject(left) || !isJsonObject(right)) {
      return false;
    }

    const keys = Object.keys(left);
    if (keys.length !== Object.keys(right).length) return false;
    for (const key of keys) {
      if (!hasOwn(right, key)) return false;
      pending.push([left[key] ?? null, right[key] ?? null]);
    }
  }
  return true;
}

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

function scalarKey(value: null | boolean | number | string): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return JSON.stringify(normalizeNumber(value));
  if (typeof value === 'string') return JSON.stringify(value);
  return value ? 'true' : 'false';
}

/** Either a value still to serialize or finished text. */
type KeyPart = { readonly value: Json } | string;

/**
 * Canonical text of a value (sorted object keys, -0 folded into 0).
 * Two values have the same key exactly when deepEqual holds.
 */
export function canonicalKey(value: Json): string {
  const out: string[] = [];
  const pending: KeyPart[] = [{ value }];

  while (pending.length > 0) {
    const part = pending.pop();
    if (part === undefined) break;
    if (typeof part === 'string') {
      out.push(part);
      continue;
    }

    const current = part.value;
    if (current === null || typeof current !== 'object') {
      out.push(scalarKey(current));
      continue;
    }

    // pushed in reverse so that they pop in output order
    if (Array.isArray(current)) {
      pending.push(']');
      for (let i = current.length - 1; i >= 0; i--) {
        pending.push({ value: current[i] ?? null });
        if (i > 0) pending.push(',');
      }
      pending.push('[');
      continue;
    }

    const keys = Object.keys(current).sort();
    pending.push('}');
    for (let i = keys.length - 1; i >= 0; i--) {
      const key = keys[i] ?? '';
      pending.push({ value: current[key] ?? null });
      pending.push(`${JSON.stringify(key)}:`);
      if (i > 0) pending.push(',');
    }
    pending.push('{');
  }
  return out.join('');
}
