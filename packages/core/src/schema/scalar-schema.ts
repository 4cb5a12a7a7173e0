/**
 * Leaf schemas for scalar instance types. They carry the base keywords plus
 * the handful of value keywords their type takes.
 */

import { ErrorCode } from '../errors/codes';
import type { BuildOptions, ResolvedBuildOptions } from '../types/options';
import { ConstraintViolation, type SchemaBuildError } from '../types/errors';
import type {
  BaseKeywords,
  BooleanKeywords,
  NumericKeywords,
  StringKeywords,
} from '../types/keywords';
import type { Result } from '../types/result';
import { BaseSchemaNode } from './base-schema';
import { tryBuild } from './build';
import {
  checkCountRange,
  checkNonBlankString,
  expectBoolean,
  expectFiniteNumber,
  expectInteger,
  expectList,
  expectString,
  pointer,
  requireCompilablePattern,
  requireNonEmpty,
  requireOrderedRange,
} from './keyword-rules';
import type { KeywordEntry, SchemaFamily } from './node';

type ValueCheck = (keyword: string, value: unknown) => void;

export const STRING_KEYWORDS = [
  'minLength',
  'maxLength',
  'pattern',
  'format',
  'enum',
  'const',
  'default',
] as const satisfies readonly (keyof StringKeywords)[];

export const NUMERIC_KEYWORDS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'enum',
  'const',
  'default',
] as const satisfies readonly (keyof NumericKeywords)[];

export const BOOLEAN_KEYWORDS = [
  'const',
  'default',
] as const satisfies readonly (keyof BooleanKeywords)[];

export class StringSchemaNode extends BaseSchemaNode<StringKeywords> {
  constructor(keywords: StringKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'string';
  }

  protected override get familyKeywords(): readonly string[] {
    return STRING_KEYWORDS;
  }

  protected override get typeName(): string {
    return 'string';
  }

  protected override validateFamilyKeywords(
    keywords: StringKeywords,
    options: ResolvedBuildOptions
  ): void {
    checkCountRange(
      'minLength',
      keywords.minLength,
      'maxLength',
      keywords.maxLength
    );

    const pattern: unknown = keywords.pattern;
    if (pattern !== undefined) {
      expectString('pattern', pattern);
      requireCompilablePattern('pattern', pattern, options.patterns.flags);
    }
    checkNonBlankString('format', keywords.format);

    checkValueKeywords(keywords, expectString);
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords = this.keywords;
    return STRING_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

export class NumberSchemaNode extends BaseSchemaNode<NumericKeywords> {
  constructor(keywords: NumericKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'number';
  }

  protected override get familyKeywords(): readonly string[] {
    return NUMERIC_KEYWORDS;
  }

  protected override get typeName(): string {
    return 'number';
  }

  /** Check applied to bounds and literal values */
  protected get valueCheck(): ValueCheck {
    return expectFiniteNumber;
  }

  protected override validateFamilyKeywords(keywords: NumericKeywords): void {
    const check = this.valueCheck;
    for (const keyword of [
      'minimum',
      'maximum',
      'exclusiveMinimum',
      'exclusiveMaximum',
    ] as const) {
      const value: unknown = keywords[keyword];
      if (value !== undefined) check(keyword, value);
    }
    requireOrderedRange('minimum', keywords.minimum, 'maximum', keywords.maximum);

    const multipleOf: unknown = keywords.multipleOf;
    if (multipleOf !== undefined) {
      check('multipleOf', multipleOf);
      if (typeof multipleOf === 'number' && multipleOf <= 0) {
        throw new ConstraintViolation({
          message: 'multipleOf must be greater than 0',
          errorCode: ErrorCode.NON_POSITIVE_MULTIPLE,
          keyword: 'multipleOf',
          value: multipleOf,
          rule: 'positive:multipleOf',
          context: { schemaPath: pointer('multipleOf') },
        });
      }
    }

    checkValueKeywords(keywords, check);
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords = this.keywords;
    return NUMERIC_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

export class IntegerSchemaNode extends NumberSchemaNode {
  override get family(): SchemaFamily {
    return 'integer';
  }

  protected override get typeName(): string {
    return 'integer';
  }

  protected override get valueCheck(): ValueCheck {
    return expectInteger;
  }
}

export class BooleanSchemaNode extends BaseSchemaNode<BooleanKeywords> {
  constructor(keywords: BooleanKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'boolean';
  }

  protected override get familyKeywords(): readonly string[] {
    return BOOLEAN_KEYWORDS;
  }

  protected override get typeName(): string {
    return 'boolean';
  }

  protected override validateFamilyKeywords(keywords: BooleanKeywords): void {
    for (const keyword of BOOLEAN_KEYWORDS) {
      const value: unknown = keywords[keyword];
      if (value !== undefined) expectBoolean(keyword, value);
    }
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords = this.keywords;
    return BOOLEAN_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

export class NullSchemaNode extends BaseSchemaNode {
  constructor(keywords: BaseKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'null';
  }

  protected override get typeName(): string {
    return 'null';
  }
}

// enum, const and default hold literals of the node's own type
function checkValueKeywords(
  keywords: { readonly enum?: unknown; readonly const?: unknown; readonly default?: unknown },
  check: ValueCheck
): void {
  if (keywords.enum !== undefined) {
    const values: unknown = keywords.enum;
    expectList('enum', values);
    requireNonEmpty('enum', values, 'value');
    for (const value of values) check('enum', value);
  }
  for (const keyword of ['const', 'default'] as const) {
    const value = keywords[keyword];
    if (value !== undefined) check(keyword, value);
  }
}

export function createStringSchema(
  keywords: StringKeywords = {},
  options?: BuildOptions
): Result<StringSchemaNode, SchemaBuildError> {
  return tryBuild(() => new StringSchemaNode(keywords, options));
}

export function createNumberSchema(
  keywords: NumericKeywords = {},
  options?: BuildOptions
): Result<NumberSchemaNode, SchemaBuildError> {
  return tryBuild(() => new NumberSchemaNode(keywords, options));
}

export function createIntegerSchema(
  keywords: NumericKeywords = {},
  options?: BuildOptions
): Result<IntegerSchemaNode, SchemaBuildError> {
  return tryBuild(() => new IntegerSchemaNode(keywords, options));
}

export function createBooleanSchema(
  keywords: BooleanKeywords = {},
  options?: BuildOptions
): Result<BooleanSchemaNode, SchemaBuildError> {
  return tryBuild(() => new BooleanSchemaNode(keywords, options));
}

export function createNullSchema(
  keywords: BaseKeywords = {},
  options?: BuildOptions
): Result<NullSchemaNode, SchemaBuildError> {
  return tryBuild(() => new NullSchemaNode(keywords, options));
}
