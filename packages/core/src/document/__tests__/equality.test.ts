import { describe, expect, test } from 'vitest';
import type { Json } from '../json.js';
import { canonicalKey, deepEqual } from '../equality.js';

function nestedArray(depth: number): Json {
  let value: Json = [];
  for (let i = 0; i < depth; i++) value = [value];
  return value;
}

describe('deepEqual', () => {
  test('compares objects regardless of key order', () => {
    expect(deepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
  });

  test('arrays are ordered', () => {
    expect(deepEqual([1, 2], [2, 1])).toBe(false);
  });

  test('distinguishes types that look alike', () => {
    expect(deepEqual(1, '1')).toBe(false);
    expect(deepEqual(null, {})).toBe(false);
    expect(deepEqual([], {})).toBe(false);
    expect(deepEqual({ a: null }, {})).toBe(false);
  });

  test('handles nesting far past the call stack depth', () => {
    expect(deepEqual(nestedArray(20000), nestedArray(20000))).toBe(true);
    expect(deepEqual(nestedArray(20000), nestedArray(19999))).toBe(false);
  });
});

describe('canonicalKey', () => {
  test('sorts keys and folds -0', () => {
    expect(canonicalKey({ b: 1, a: -0 })).toBe('{"a":0,"b":1}');
  });

  test('equal keys exactly for deep-equal values', () => {
    expect(canonicalKey([{ x: 1, y: 2 }])).toBe(canonicalKey([{ y: 2, x: 1 }]));
    expect(canonicalKey('1')).not.toBe(canonicalKey(1));
  });

  test('serializes nested values in order', () => {
    expect(canonicalKey({ c: 'x', a: [1, { b: null }, true] })).toBe(
      '{"a":[1,{"b":null},true],"c":"x"}'
    );
    expect(canonicalKey([[], {}])).toBe('[[],{}]');
  });

  test('handles nesting far past the call stack depth', () => {
    expect(canonicalKey(nestedArray(3))).toBe('[[[[]]]]');
    expect(canonicalKey(nestedArray(20000))).toHaveLength(40002);
  });
});
