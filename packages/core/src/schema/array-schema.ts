import type { BuildOptions } from '../types/options';
import { ShapeError, type SchemaBuildError } from '../types/errors';
import type { ArrayKeywords } from '../types/keywords';
import type { Result } from '../types/result';
import { BaseSchemaNode } from './base-schema';
import { tryBuild } from './build';
import {
  checkConditionals,
  checkCountRange,
  checkNodeList,
  expectBoolean,
  expectList,
  expectNode,
  expectNodeOrBoolean,
  pointer,
  requireCompanion,
  requireNonEmpty,
} from './keyword-rules';
import {
  isSchemaNode,
  type KeywordEntry,
  type SchemaFamily,
  type SchemaNode,
} from './node';

export type ArraySchemaKeywords = ArrayKeywords<ArraySchemaNode>;

export const ARRAY_KEYWORDS = [
  'items',
  'prefixItems',
  'contains',
  'minItems',
  'maxItems',
  'minContains',
  'maxContains',
  'uniqueItems',
  'unevaluatedItems',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'if',
  'then',
  'else',
] as const satisfies readonly (keyof ArraySchemaKeywords)[];

const MEMBER_NAME = 'an array schema node';

/**
 * Array-typed schema. Composition and conditional members must themselves
 * be array schemas, so a composed array schema stays an array schema.
 */
export class ArraySchemaNode extends BaseSchemaNode<ArraySchemaKeywords> {
  constructor(keywords: ArraySchemaKeywords = {}, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'array';
  }

  protected override get familyKeywords(): readonly string[] {
    return ARRAY_KEYWORDS;
  }

  protected override get typeName(): string {
    return 'array';
  }

  protected override validateFamilyKeywords(
    keywords: ArraySchemaKeywords
  ): void {
    checkItems(keywords.items);

    const prefixItems: unknown = keywords.prefixItems;
    if (prefixItems !== undefined) {
      checkSchemaList('prefixItems', prefixItems);
    }

    const contains: unknown = keywords.contains;
    if (contains !== undefined) expectNode('contains', contains);

    checkCountRange('minItems', keywords.minItems, 'maxItems', keywords.maxItems);
    checkCountRange(
      'minContains',
      keywords.minContains,
      'maxContains',
      keywords.maxContains
    );
    if (keywords.minContains !== undefined) {
      requireCompanion('minContains', 'contains', contains);
    }
    if (keywords.maxContains !== undefined) {
      requireCompanion('maxContains', 'contains', contains);
    }

    const uniqueItems: unknown = keywords.uniqueItems;
    if (uniqueItems !== undefined) expectBoolean('uniqueItems', uniqueItems);
    if (keywords.unevaluatedItems !== undefined) {
      expectNodeOrBoolean('unevaluatedItems', keywords.unevaluatedItems);
    }

    for (const keyword of ['allOf', 'anyOf', 'oneOf'] as const) {
      checkNodeList(keyword, keywords[keyword], isArraySchemaNode, MEMBER_NAME);
    }
    checkConditionals(keywords, isArraySchemaNode, MEMBER_NAME);
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords = this.keywords;
    return ARRAY_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

export function isArraySchemaNode(node: SchemaNode): node is ArraySchemaNode {
  return node instanceof ArraySchemaNode;
}

// `items` takes one node, or a non-empty tuple list of nodes
function checkItems(items: unknown): void {
  if (items === undefined || isSchemaNode(items)) return;
  if (!Array.isArray(items)) {
    throw new ShapeError({
      message: 'items must be a schema node or a list of schema nodes',
      keyword: 'items',
      value: items,
      rule: 'kind:items',
      context: {
        schemaPath: pointer('items'),
        expected: 'a schema node or a list of schema nodes',
      },
    });
  }
  checkSchemaList('items', items);
}

function checkSchemaList(keyword: string, value: unknown): void {
  expectList(keyword, value);
  requireNonEmpty(keyword, value, 'schema');
  value.forEach((member, index) => {
    expectNode(keyword, member, pointer(keyword, String(index)));
  });
}

export function createArraySchema(
  keywords: ArraySchemaKeywords = {},
  options?: BuildOptions
): Result<ArraySchemaNode, SchemaBuildError> {
  return tryBuild(() => new ArraySchemaNode(keywords, options));
}
