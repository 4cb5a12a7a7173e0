import { ErrorCode } from '../errors/codes';
import type { BuildOptions, ResolvedBuildOptions } from '../types/options';
import { ConstraintViolation, type SchemaBuildError } from '../types/errors';
import type { ObjectKeywords } from '../types/keywords';
import type { Result } from '../types/result';
import { BaseSchemaNode } from './base-schema';
import { tryBuild } from './build';
import {
  anySchemaNode,
  checkConditionals,
  checkCountRange,
  checkKeyedMap,
  checkNameList,
  checkNodeList,
  checkNodeMap,
  expectNode,
  expectNodeOrBoolean,
  pointer,
  requireCompilablePattern,
} from './keyword-rules';
import type { KeywordEntry, SchemaFamily } from './node';

export type ObjectSchemaKeywords = ObjectKeywords;

export const OBJECT_KEYWORDS = [
  'properties',
  'patternProperties',
  'additionalProperties',
  'unevaluatedProperties',
  'required',
  'propertyNames',
  'minProperties',
  'maxProperties',
  'dependentRequired',
  'dependentSchemas',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'if',
  'then',
  'else',
] as const satisfies readonly (keyof ObjectSchemaKeywords)[];

const MEMBER_NAME = 'a schema node';

/**
 * Object-typed schema. Composition and conditional members may be any
 * schema node.
 */
export class ObjectSchemaNode extends BaseSchemaNode<ObjectSchemaKeywords> {
  constructor(keywords: ObjectSchemaKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'object';
  }

  protected override get familyKeywords(): readonly string[] {
    return OBJECT_KEYWORDS;
  }

  protected override get typeName(): string {
    return 'object';
  }

  protected override validateFamilyKeywords(
    keywords: ObjectSchemaKeywords,
    options: ResolvedBuildOptions
  ): void {
    checkNodeMap('properties', keywords.properties);

    const patternProperties: unknown = keywords.patternProperties;
    if (patternProperties !== undefined) {
      checkKeyedMap('patternProperties', patternProperties, (key, entry, path) => {
        requireCompilablePattern(
          'patternProperties',
          key,
          options.patterns.flags,
          path
        );
        expectNode('patternProperties', entry, path);
      });
    }

    for (const keyword of ['additionalProperties', 'unevaluatedProperties'] as const) {
      const value: unknown = keywords[keyword];
      if (value !== undefined) expectNodeOrBoolean(keyword, value);
    }

    const required: unknown = keywords.required;
    if (required !== undefined) checkNameList('required', required);

    const propertyNames: unknown = keywords.propertyNames;
    if (propertyNames !== undefined) expectNode('propertyNames', propertyNames);

    checkCountRange(
      'minProperties',
      keywords.minProperties,
      'maxProperties',
      keywords.maxProperties
    );

    const dependentRequired: unknown = keywords.dependentRequired;
    if (dependentRequired !== undefined) {
      checkKeyedMap('dependentRequired', dependentRequired, (_key, names, path) => {
        checkNameList('dependentRequired', names, path);
      });
    }
    checkNodeMap('dependentSchemas', keywords.dependentSchemas);

    for (const keyword of ['allOf', 'anyOf', 'oneOf'] as const) {
      checkNodeList(keyword, keywords[keyword], anySchemaNode, MEMBER_NAME);
    }
    checkConditionals(keywords, anySchemaNode, MEMBER_NAME);

    checkRequiredDeclared(keywords);
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords = this.keywords;
    return OBJECT_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

// Every required name must be declared once properties is given
function checkRequiredDeclared(keywords: ObjectSchemaKeywords): void {
  const { properties, required } = keywords;
  if (properties === undefined || required === undefined) return;

  const index = required.findIndex((name) => !Object.hasOwn(properties, name));
  if (index === -1) return;

  const name = required[index];
  throw new ConstraintViolation({
    message: `required property '${String(name)}' is not defined in properties`,
    errorCode: ErrorCode.UNKNOWN_REQUIRED_PROPERTY,
    keyword: 'required',
    value: name,
    rule: 'required-in-properties',
    context: {
      schemaPath: pointer('required', String(index)),
      properties: Object.keys(properties),
    },
  });
}

export function createObjectSchema(
  keywords: ObjectSchemaKeywords = {},
  options?: BuildOptions
): Result<ObjectSchemaNode, SchemaBuildError> {
  return tryBuild(() => new ObjectSchemaNode(keywords, options));
}
