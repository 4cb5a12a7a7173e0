import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes';
import { ShapeError } from '../../types/errors';
import { buildUntyped, captureBuildError } from '../../test-utils/build';
import {
  BooleanSchemaNode,
  createIntegerSchema,
  createNullSchema,
  IntegerSchemaNode,
  NullSchemaNode,
  NumberSchemaNode,
  StringSchemaNode,
} from '../scalar-schema';

describe('StringSchemaNode', () => {
  it('emits string keywords in canonical order', () => {
    const node = new StringSchemaNode({
      default: 'a',
      const: 'a',
      enum: ['a', 'b'],
      format: 'email',
      pattern: '^[a-z]+$',
      maxLength: 5,
      minLength: 1,
    });

    expect(Object.keys(node.toJSON())).toEqual([
      'type',
      'minLength',
      'maxLength',
      'pattern',
      'format',
      'enum',
      'const',
      'default',
    ]);
  });

  it('rejects a pattern that does not compile', () => {
    const error = captureBuildError(
      () => new StringSchemaNode({ pattern: '(' })
    );

    expect(error.errorCode).toBe(ErrorCode.INVALID_PATTERN);
    expect(error.message).toMatch(/^pattern must be a valid regular expression: /);
  });

  it('rejects a blank format', () => {
    const error = captureBuildError(() => new StringSchemaNode({ format: '' }));

    expect(error.message).toBe('format must be a non-empty string');
  });

  it('rejects minLength above maxLength', () => {
    const error = captureBuildError(
      () => new StringSchemaNode({ minLength: 4, maxLength: 2 })
    );

    expect(error.message).toBe('minLength cannot be greater than maxLength');
  });

  it('rejects an empty enum', () => {
    const error = captureBuildError(() => new StringSchemaNode({ enum: [] }));

    expect(error.errorCode).toBe(ErrorCode.EMPTY_SEQUENCE);
    expect(error.message).toBe('enum must contain at least one value');
  });

  it('rejects enum members of another type', () => {
    const error = captureBuildError(() =>
      buildUntyped(StringSchemaNode, { enum: ['a', 1] })
    );

    expect(error).toBeInstanceOf(ShapeError);
    expect(error.message).toBe('enum must be a string');
  });
});

describe('NumberSchemaNode', () => {
  it('serializes bounds in canonical order', () => {
    const node = new NumberSchemaNode({
      multipleOf: 0.5,
      exclusiveMaximum: 10,
      minimum: 0,
    });

    expect(node.toJSON()).toEqual({
      type: 'number',
      minimum: 0,
      exclusiveMaximum: 10,
      multipleOf: 0.5,
    });
    expect(Object.keys(node.toJSON())).toEqual([
      'type',
      'minimum',
      'exclusiveMaximum',
      'multipleOf',
    ]);
  });

  it('rejects minimum above maximum', () => {
    const error = captureBuildError(
      () => new NumberSchemaNode({ minimum: 5, maximum: 1 })
    );

    expect(error.errorCode).toBe(ErrorCode.INVERTED_RANGE);
    expect(error.message).toBe('minimum cannot be greater than maximum');
  });

  it.each([0, -2])('rejects multipleOf %s', (multipleOf) => {
    const error = captureBuildError(() => new NumberSchemaNode({ multipleOf }));

    expect(error.errorCode).toBe(ErrorCode.NON_POSITIVE_MULTIPLE);
    expect(error.message).toBe('multipleOf must be greater than 0');
  });

  it('rejects non-finite bounds', () => {
    const error = captureBuildError(
      () => new NumberSchemaNode({ minimum: Number.POSITIVE_INFINITY })
    );

    expect(error).toBeInstanceOf(ShapeError);
    expect(error.message).toBe('minimum must be a finite number');
  });
});

describe('IntegerSchemaNode', () => {
  it('is a number node of the integer family', () => {
    const node = new IntegerSchemaNode({ minimum: 1 });

    expect(node).toBeInstanceOf(NumberSchemaNode);
    expect(node.family).toBe('integer');
    expect(node.toJSON()).toEqual({ type: 'integer', minimum: 1 });
  });

  it('rejects fractional bounds and literals', () => {
    expect(
      captureBuildError(() => new IntegerSchemaNode({ minimum: 1.5 })).message
    ).toBe('minimum must be an integer');
    expect(
      captureBuildError(() => new IntegerSchemaNode({ const: 2.5 })).message
    ).toBe('const must be an integer');
  });

  it('is available through createIntegerSchema', () => {
    const result = createIntegerSchema({ enum: [1, 2, 3] });

    expect(result.unwrap().toJSON()).toEqual({
      type: 'integer',
      enum: [1, 2, 3],
    });
  });
});

describe('BooleanSchemaNode', () => {
  it('serializes const and default', () => {
    const node = new BooleanSchemaNode({ default: true, const: true });

    expect(node.toJSON()).toEqual({ type: 'boolean', const: true, default: true });
  });

  it('rejects non-boolean literals', () => {
    const error = captureBuildError(() =>
      buildUntyped(BooleanSchemaNode, { const: 'yes' })
    );

    expect(error.message).toBe('const must be a boolean');
  });
});

describe('NullSchemaNode', () => {
  it('carries base keywords and the null type', () => {
    const node = new NullSchemaNode({ title: 'Nothing' });

    expect(node.family).toBe('null');
    expect(node.toJSON()).toEqual({ title: 'Nothing', type: 'null' });
  });

  it('still applies the base rules', () => {
    const result = createNullSchema({ $schema: 'relative' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.errorCode).toBe(ErrorCode.INVALID_URI);
    }
  });
});

describe('unknown keywords', () => {
  it.each([
    { node: StringSchemaNode, keyword: 'minimum', family: 'string' },
    { node: NumberSchemaNode, keyword: 'minLength', family: 'number' },
    { node: IntegerSchemaNode, keyword: 'pattern', family: 'integer' },
    { node: BooleanSchemaNode, keyword: 'enum', family: 'boolean' },
    { node: NullSchemaNode, keyword: 'const', family: 'null' },
  ])('$family schema rejects $keyword', ({ node, keyword, family }) => {
    const error = captureBuildError(() =>
      buildUntyped(node, { title: 'x', [keyword]: 1 })
    );

    expect(error.errorCode).toBe(ErrorCode.UNKNOWN_KEYWORD);
    expect(error.keyword).toBe(keyword);
    expect(error.message).toBe(
      `Unknown keyword for ${family} schema: ${keyword}`
    );
  });
});
