import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes';
import {
  ConstraintViolation,
  isSchemaBuildError,
  SchemaBuildError,
  ShapeError,
} from '../errors';

describe('SchemaBuildError hierarchy', () => {
  it('ShapeError defaults to INVALID_KIND and exposes expected', () => {
    const error = new ShapeError({
      message: 'minItems must be an integer',
      keyword: 'minItems',
      value: 'three',
      context: { schemaPath: '/minItems', expected: 'an integer' },
    });

    expect(error).toBeInstanceOf(SchemaBuildError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ShapeError');
    expect(error.errorCode).toBe(ErrorCode.INVALID_KIND);
    expect(error.kind).toBe('shape');
    expect(error.keyword).toBe('minItems');
    expect(error.value).toBe('three');
    expect(error.rule).toBe('E001');
    expect(error.expected).toBe('an integer');
  });

  it('ShapeError accepts INVALID_FAMILY', () => {
    const error = new ShapeError({
      message:
        "allOf must be an array schema node, got a schema node of family 'object'",
      errorCode: ErrorCode.INVALID_FAMILY,
      keyword: 'allOf',
    });

    expect(error.errorCode).toBe(ErrorCode.INVALID_FAMILY);
    expect(error.expected).toBeUndefined();
  });

  it('ConstraintViolation carries rule and cause', () => {
    const cause = new SyntaxError('Invalid regular expression');
    const error = new ConstraintViolation({
      message: 'pattern must be a valid regular expression',
      errorCode: ErrorCode.INVALID_PATTERN,
      keyword: 'pattern',
      value: '(',
      rule: 'regex:pattern',
      cause,
    });

    expect(error.kind).toBe('constraint');
    expect(error.rule).toBe('regex:pattern');
    expect(error.cause).toBe(cause);
  });

  it('toJSON keeps the value and stack in dev only', () => {
    const error = new ConstraintViolation({
      message: 'minItems must be non-negative',
      errorCode: ErrorCode.NEGATIVE_BOUND,
      keyword: 'minItems',
      value: -1,
      rule: 'non-negative:minItems',
    });

    const dev = error.toJSON();
    expect(dev.value).toBe(-1);
    expect(typeof dev.stack).toBe('string');
    expect(dev.kind).toBe('constraint');

    const prod = error.toJSON('prod');
    expect(prod).not.toHaveProperty('value');
    expect(prod).not.toHaveProperty('stack');
    expect(prod.errorCode).toBe('E110');
    expect(prod.cause).toBeUndefined();
  });

  it('toUserError exposes message, code and keyword', () => {
    const error = new ConstraintViolation({
      message: "'then' and 'else' require 'if' to be specified",
      errorCode: ErrorCode.MISSING_DEPENDENCY,
      keyword: 'then',
    });

    expect(error.toUserError()).toEqual({
      message: "'then' and 'else' require 'if' to be specified",
      code: ErrorCode.MISSING_DEPENDENCY,
      keyword: 'then',
    });
  });

  it('isSchemaBuildError distinguishes construction failures', () => {
    const error = new ShapeError({ message: 'x', keyword: 'title' });

    expect(isSchemaBuildError(error)).toBe(true);
    expect(isSchemaBuildError(new Error('x'))).toBe(false);
    expect(isSchemaBuildError('x')).toBe(false);
  });
});
