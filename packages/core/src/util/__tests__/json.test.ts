import { describe, it, expect } from 'vitest';
import { frozenCopy, isJsonValue, isPlainObject } from '../json';

class Box {
  constructor(public readonly inner: number[]) {}
}

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype maps', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, class instances and primitives', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Box([]))).toBe(false);
    expect(isPlainObject(new Date(0))).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('a')).toBe(false);
  });
});

describe('isJsonValue', () => {
  it('accepts nested JSON data', () => {
    expect(isJsonValue({ a: [1, 'two', null, { b: false }] })).toBe(true);
  });

  it('rejects non-finite numbers and non-JSON kinds', () => {
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(Infinity)).toBe(false);
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue({ a: () => 1 })).toBe(false);
    expect(isJsonValue([1n])).toBe(false);
    expect(isJsonValue(new Box([1]))).toBe(false);
  });

  it('rejects cycles but accepts shared references', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    const shared = { x: 1 };

    expect(isJsonValue(cyclic)).toBe(false);
    expect(isJsonValue([shared, shared])).toBe(true);
  });
});

describe('frozenCopy', () => {
  it('returns frozen copies of arrays and plain objects', () => {
    const data = { list: [1, { deep: true }] };
    const copy = frozenCopy(data);

    expect(copy).toEqual(data);
    expect(copy).not.toBe(data);
    expect(copy.list).not.toBe(data.list);
    expect(Object.isFrozen(copy)).toBe(true);
    expect(Object.isFrozen(copy.list)).toBe(true);
    expect(Object.isFrozen(copy.list[1])).toBe(true);
  });

  it('leaves the input unfrozen', () => {
    const data = { list: [1, { deep: true }] };
    frozenCopy(data);

    expect(Object.isFrozen(data)).toBe(false);
    expect(Object.isFrozen(data.list)).toBe(false);
    expect(Object.isFrozen(data.list[1])).toBe(false);
  });

  it('shares class instances instead of copying them', () => {
    const box = new Box([1]);
    const copy = frozenCopy([box]);

    expect(copy[0]).toBe(box);
    expect(Object.isFrozen(box)).toBe(false);
    expect(Object.isFrozen(box.inner)).toBe(false);
  });

  it('keeps a __proto__ key as an own property', () => {
    const data: Record<string, number> = {};
    Object.defineProperty(data, '__proto__', {
      value: 1,
      enumerable: true,
      writable: true,
      configurable: true,
    });

    const copy = frozenCopy(data);

    expect(Object.keys(copy)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(copy)).toBe(Object.prototype);
  });
});
