import { ErrorCode } from '../errors/codes';
import type { BuildOptions } from '../types/options';
import { ConstraintViolation, type SchemaBuildError } from '../types/errors';
import type { MetaSchemaKeywords } from '../types/keywords';
import type { Result } from '../types/result';
import { BaseSchemaNode } from './base-schema';
import { tryBuild } from './build';
import { anySchemaNode, checkNodeList, pointer } from './keyword-rules';
import type { KeywordEntry, SchemaFamily } from './node';

export const META_KEYWORDS = [
  'allOf',
] as const satisfies readonly (keyof MetaSchemaKeywords)[];

/**
 * Root of a dialect meta-schema: identified by `$id`, declaring the
 * vocabularies it uses, usually composing the vocabulary schemas via allOf.
 * Emits no `type`.
 */
export class MetaSchemaNode extends BaseSchemaNode<MetaSchemaKeywords> {
  constructor(keywords: MetaSchemaKeywords, options?: BuildOptions) {
    super(keywords, options);
  }

  override get family(): SchemaFamily {
    return 'meta';
  }

  protected override get familyKeywords(): readonly string[] {
    return META_KEYWORDS;
  }

  protected override validateFamilyKeywords(keywords: MetaSchemaKeywords): void {
    if (keywords.$id === undefined) {
      throw missingKeyword('$id', 'a meta-schema must declare $id');
    }
    const vocabulary: unknown = keywords.$vocabulary;
    if (
      vocabulary === undefined ||
      (typeof vocabulary === 'object' &&
        vocabulary !== null &&
        Object.keys(vocabulary).length === 0)
    ) {
      throw missingKeyword(
        '$vocabulary',
        'a meta-schema must declare at least one $vocabulary entry'
      );
    }

    checkNodeList('allOf', keywords.allOf, anySchemaNode, 'a schema node');
  }

  protected override familyEntries(): KeywordEntry[] {
    const keywords: Readonly<MetaSchemaKeywords> = this.keywords;
    return META_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
  }
}

function missingKeyword(keyword: string, message: string): ConstraintViolation {
  return new ConstraintViolation({
    message,
    errorCode: ErrorCode.MISSING_META_KEYWORD,
    keyword,
    rule: `meta:${keyword}`,
    context: { schemaPath: pointer(keyword) },
  });
}

export function createMetaSchema(
  keywords: MetaSchemaKeywords,
  options?: BuildOptions
): Result<MetaSchemaNode, SchemaBuildError> {
  return tryBuild(() => new MetaSchemaNode(keywords, options));
}
