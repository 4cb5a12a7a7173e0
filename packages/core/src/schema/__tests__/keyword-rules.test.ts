import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes';
import { captureBuildError } from '../../test-utils/build';
import {
  checkNameList,
  pointer,
  requireAtMostOne,
  requireCompilablePattern,
} from '../keyword-rules';
import { nestedDepth } from '../node';
import { StringSchemaNode } from '../scalar-schema';

describe('pointer', () => {
  it('escapes ~ and / in segments', () => {
    expect(pointer('properties', 'a/b', 'c~d')).toBe('/properties/a~1b/c~0d');
  });

  it('is empty for no segments', () => {
    expect(pointer()).toBe('');
  });
});

describe('requireAtMostOne', () => {
  it('passes when at most one key is set', () => {
    expect(() =>
      requireAtMostOne({ a: undefined, b: 1 }, 'only one')
    ).not.toThrow();
  });

  it('names the second key that is set', () => {
    const error = captureBuildError(() =>
      requireAtMostOne({ a: 1, b: undefined, c: 0 }, 'only one')
    );

    expect(error.errorCode).toBe(ErrorCode.MUTUALLY_EXCLUSIVE);
    expect(error.keyword).toBe('c');
    expect(error.value).toEqual(['a', 'c']);
    expect(error.rule).toBe('exclusive:a|b|c');
  });
});

describe('requireCompilablePattern', () => {
  it('keeps the SyntaxError as the cause', () => {
    const error = captureBuildError(() =>
      requireCompilablePattern('pattern', '[', 'u')
    );

    expect(error.cause).toBeInstanceOf(SyntaxError);
    expect(error.context?.schemaPath).toBe('/pattern');
  });
});

describe('checkNameList', () => {
  it('uses the given path', () => {
    const error = captureBuildError(() =>
      checkNameList('dependentRequired', ['a', 'a'], '/dependentRequired/b')
    );

    expect(error.errorCode).toBe(ErrorCode.DUPLICATE_ENTRY);
    expect(error.context?.schemaPath).toBe('/dependentRequired/b');
  });
});

describe('nestedDepth', () => {
  it('takes the deepest node inside lists and maps', () => {
    const leaf = new StringSchemaNode();

    expect(nestedDepth(undefined)).toBe(0);
    expect(nestedDepth('text')).toBe(0);
    expect(nestedDepth({ a: [1, { b: leaf }] })).toBe(1);
  });
});
