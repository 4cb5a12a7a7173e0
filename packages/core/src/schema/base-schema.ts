/**
 * Generic schema node: the keywords every schema shape shares
 * ($id/$schema, references, anchors, definitions, $vocabulary, annotations).
 *
 * Construction validates everything up front and then freezes the node;
 * subclasses add their own keywords through validateFamilyKeywords and
 * familyEntries, and never hold state of their own.
 */

import { ErrorCode } from '../errors/codes';
import {
  resolveBuildOptions,
  type BuildOptions,
  type ResolvedBuildOptions,
} from '../types/options';
import {
  ConstraintViolation,
  isSchemaBuildError,
  ShapeError,
  type SchemaBuildError,
} from '../types/errors';
import type { BaseKeywords } from '../types/keywords';
import type { Result } from '../types/result';
import { log } from '../util/debug';
import { frozenCopy, isJsonValue, type JsonObject } from '../util/json';
import { tryBuild } from './build';
import {
  checkKeyedMap,
  expectBoolean,
  expectString,
  requireAnchorName,
  requireAtMostOne,
  requireNonBlank,
  requireUri,
  requireUriReference,
  pointer,
} from './keyword-rules';
import {
  isSchemaNode,
  nestedDepth,
  SCHEMA_NODE,
  type KeywordEntry,
  type SchemaFamily,
  type SchemaNode,
} from './node';
import { serializeSchema } from './serializer';

export const BASE_KEYWORDS = [
  '$id',
  '$schema',
  '$ref',
  '$dynamicRef',
  '$recursiveRef',
  'definitions',
  '$defs',
  '$comment',
  '$anchor',
  '$dynamicAnchor',
  '$recursiveAnchor',
  '$vocabulary',
  'title',
  'description',
  'deprecated',
  'readOnly',
  'writeOnly',
] as const satisfies readonly (keyof BaseKeywords)[];

export class BaseSchemaNode<K extends BaseKeywords = BaseKeywords>
  implements SchemaNode
{
  readonly [SCHEMA_NODE] = true as const;
  readonly keywords: Readonly<K>;
  readonly depth: number;

  constructor(keywords: K, options: BuildOptions = {}) {
    const resolved = resolveBuildOptions(options);

    try {
      rejectUnknownKeywords(keywords, this.family, this.familyKeywords);
      validateBaseKeywords(keywords, this.family, resolved);
      this.validateFamilyKeywords(keywords, resolved);

      const stored = frozenCopy({ ...keywords });
      const depth = 1 + maxNestedDepth(Object.values(stored));
      if (depth > resolved.guards.maxDepth) {
        throw new ConstraintViolation({
          message: `Schema nesting depth ${depth} exceeds the limit of ${resolved.guards.maxDepth}`,
          errorCode: ErrorCode.NESTING_TOO_DEEP,
          value: depth,
          rule: 'depth<=guards.maxDepth',
          context: { limit: resolved.guards.maxDepth },
        });
      }

      this.keywords = stored;
      this.depth = depth;
    } catch (error) {
      if (isSchemaBuildError(error)) {
        log.reject(
          '%s schema rejected [%s] %s',
          this.family,
          error.errorCode,
          error.message
        );
      }
      throw error;
    }

    Object.freeze(this);
    log.build('%s schema built (depth %d)', this.family, this.depth);
  }

  get family(): SchemaFamily {
    return 'generic';
  }

  /** Keywords the family accepts on top of BASE_KEYWORDS */
  protected get familyKeywords(): readonly string[] {
    return [];
  }

  /** Value emitted as `type`, if the family has one */
  protected get typeName(): string | undefined {
    return undefined;
  }

  /**
   * Hook for subclasses: validate the family's own keywords. Runs after the
   * base keywords passed and before anything is stored.
   */
  protected validateFamilyKeywords(
    _keywords: K,
    _options: ResolvedBuildOptions
  ): void {}

  /** Hook for subclasses: family keywords in canonical order */
  protected familyEntries(): KeywordEntry[] {
    return [];
  }

  keywordEntries(): readonly KeywordEntry[] {
    const keywords: Readonly<BaseKeywords> = this.keywords;
    const entries: KeywordEntry[] = BASE_KEYWORDS.map(
      (keyword): KeywordEntry => [keyword, keywords[keyword]]
    );
    const typeName = this.typeName;
    if (typeName !== undefined) {
      entries.push(['type', typeName]);
    }
    entries.push(...this.familyEntries());
    return entries;
  }

  toJSON(): JsonObject {
    return serializeSchema(this);
  }
}

function maxNestedDepth(values: readonly unknown[]): number {
  let deepest = 0;
  for (const value of values) {
    deepest = Math.max(deepest, nestedDepth(value));
  }
  return deepest;
}

const BASE_KEYWORD_SET: ReadonlySet<string> = new Set(BASE_KEYWORDS);

function rejectUnknownKeywords(
  keywords: object,
  family: SchemaFamily,
  familyKeywords: readonly string[]
): void {
  for (const keyword of Object.keys(keywords)) {
    if (BASE_KEYWORD_SET.has(keyword) || familyKeywords.includes(keyword)) {
      continue;
    }
    throw new ConstraintViolation({
      message: `Unknown keyword for ${family} schema: ${keyword}`,
      errorCode: ErrorCode.UNKNOWN_KEYWORD,
      keyword,
      rule: `known-keyword:${family}`,
      context: { schemaPath: pointer(keyword) },
    });
  }
}

/**
 * Rules for the keywords every node carries
 */
export function validateBaseKeywords(
  keywords: BaseKeywords,
  family: SchemaFamily,
  options: ResolvedBuildOptions
): void {
  checkId(keywords.$id);
  checkSchemaUri(keywords.$schema);

  checkReferences(keywords);
  checkAnchors(keywords);
  checkVocabulary(keywords.$vocabulary, family, options);

  for (const keyword of ['$comment', 'title', 'description'] as const) {
    const value: unknown = keywords[keyword];
    if (value !== undefined) expectString(keyword, value);
  }
  for (const keyword of ['deprecated', 'readOnly', 'writeOnly'] as const) {
    const value: unknown = keywords[keyword];
    if (value !== undefined) expectBoolean(keyword, value);
  }
  if (keywords.readOnly === true && keywords.writeOnly === true) {
    throw new ConstraintViolation({
      message: 'Schema cannot be both readOnly and writeOnly',
      errorCode: ErrorCode.MUTUALLY_EXCLUSIVE,
      keyword: 'writeOnly',
      value: { readOnly: true, writeOnly: true },
      rule: 'exclusive:readOnly|writeOnly',
      context: { schemaPath: pointer('writeOnly') },
    });
  }

  checkDefinitions(keywords);
}

// $id may be relative to the retrieval URI but may not carry a fragment
function checkId(value: unknown): void {
  if (value === undefined) return;
  expectString('$id', value);
  requireNonBlank('$id', value);
  requireUriReference('$id', value);

  const hash = value.indexOf('#');
  if (hash !== -1 && hash < value.length - 1) {
    throw new ConstraintViolation({
      message: `$id must not contain a non-empty fragment: ${value}`,
      errorCode: ErrorCode.INVALID_URI_REFERENCE,
      keyword: '$id',
      value,
      rule: 'no-fragment:$id',
      context: { schemaPath: pointer('$id') },
    });
  }
}

function checkSchemaUri(value: unknown): void {
  if (value === undefined) return;
  expectString('$schema', value);
  requireNonBlank('$schema', value);
  requireUri('$schema', value);
}

function checkReferences(keywords: BaseKeywords): void {
  const { $ref, $dynamicRef, $recursiveRef } = keywords;
  requireAtMostOne(
    { $ref, $dynamicRef, $recursiveRef },
    'Only one reference type allowed: $ref, $dynamicRef, or $recursiveRef'
  );

  for (const keyword of ['$ref', '$dynamicRef', '$recursiveRef'] as const) {
    const value: unknown = keywords[keyword];
    if (value === undefined) continue;
    expectString(keyword, value);
    requireNonBlank(keyword, value);
    requireUriReference(keyword, value);
  }
}

function checkAnchors(keywords: BaseKeywords): void {
  const { $anchor, $dynamicAnchor, $recursiveAnchor } = keywords;
  requireAtMostOne(
    { $anchor, $dynamicAnchor, $recursiveAnchor },
    'Only one anchor type allowed: $anchor, $dynamicAnchor, or $recursiveAnchor'
  );

  for (const keyword of ['$anchor', '$dynamicAnchor'] as const) {
    const value: unknown = keywords[keyword];
    if (value === undefined) continue;
    expectString(keyword, value);
    requireNonBlank(keyword, value);
    requireAnchorName(keyword, value);
  }

  const recursiveAnchor: unknown = $recursiveAnchor;
  if (recursiveAnchor !== undefined) {
    expectBoolean('$recursiveAnchor', recursiveAnchor);
  }
}

function checkVocabulary(
  vocabulary: unknown,
  family: SchemaFamily,
  options: ResolvedBuildOptions
): void {
  if (vocabulary === undefined) return;

  checkKeyedMap('$vocabulary', vocabulary, (uri, required, path) => {
    requireUri('$vocabulary', uri, '$vocabulary keys', path);
    if (typeof required !== 'boolean') {
      throw new ShapeError({
        message: `$vocabulary values must be boolean: ${uri}`,
        keyword: '$vocabulary',
        value: required,
        rule: 'kind:$vocabulary',
        context: { schemaPath: path, expected: 'a boolean' },
      });
    }
  });

  if (options.vocabulary === 'meta-only' && family !== 'meta') {
    throw new ConstraintViolation({
      message: '$vocabulary is only allowed on meta-schema roots',
      errorCode: ErrorCode.VOCABULARY_OUTSIDE_META_SCHEMA,
      keyword: '$vocabulary',
      value: vocabulary,
      rule: 'vocabulary:meta-only',
      context: { schemaPath: pointer('$vocabulary') },
    });
  }
}

function checkDefinitions(keywords: BaseKeywords): void {
  const { definitions, $defs } = keywords;
  requireAtMostOne(
    { definitions, $defs },
    "Use either 'definitions' (draft-07) or '$defs' (2019-09+), not both"
  );

  for (const keyword of ['definitions', '$defs'] as const) {
    const value: unknown = keywords[keyword];
    if (value === undefined) continue;
    checkKeyedMap(keyword, value, (_key, entry, path) => {
      if (!isSchemaNode(entry) && !isJsonValue(entry)) {
        throw new ShapeError({
          message: `${keyword} values must be schema nodes or JSON values`,
          keyword,
          value: entry,
          rule: `kind:${keyword}`,
          context: { schemaPath: path, expected: 'a schema node or a JSON value' },
        });
      }
    });
  }
}

export function createBaseSchema(
  keywords: BaseKeywords = {},
  options?: BuildOptions
): Result<BaseSchemaNode, SchemaBuildError> {
  return tryBuild(() => new BaseSchemaNode(keywords, options));
}
