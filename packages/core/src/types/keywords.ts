/**
 * Keyword configurations accepted by the node constructors
 * Property names are the canonical JSON Schema spellings; a keyword left
 * undefined is absent from the built node and from its serialization.
 */

import type { SchemaNode } from '../schema/node';
import type { JsonValue } from '../util/json';

/** Entry of a definitions / $defs container */
export type DefinitionValue = SchemaNode | JsonValue;

export interface BaseKeywords {
  $id?: string;
  $schema?: string;

  // Reference group: at most one
  $ref?: string;
  $dynamicRef?: string;
  $recursiveRef?: string;

  // Definitions group: at most one (definitions is the draft-07 spelling)
  definitions?: Readonly<Record<string, DefinitionValue>>;
  $defs?: Readonly<Record<string, DefinitionValue>>;

  $comment?: string;

  // Anchor group: at most one
  $anchor?: string;
  $dynamicAnchor?: string;
  $recursiveAnchor?: boolean;

  /**
   * Vocabulary URI → required flag. Meaningful only on meta-schema roots;
   * see `BuildOptions.vocabulary`.
   */
  $vocabulary?: Readonly<Record<string, boolean>>;

  // Annotations
  title?: string;
  description?: string;
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
}

/**
 * Composition and conditional keywords, typed by the member family a
 * container accepts
 */
export interface CompositionKeywords<M extends SchemaNode> {
  allOf?: readonly M[];
  anyOf?: readonly M[];
  oneOf?: readonly M[];
  not?: M;
  if?: M;
  then?: M;
  else?: M;
}

export interface ArrayKeywords<M extends SchemaNode = SchemaNode>
  extends BaseKeywords,
    CompositionKeywords<M> {
  /** One node for every item, or the legacy tuple form */
  items?: SchemaNode | readonly SchemaNode[];
  prefixItems?: readonly SchemaNode[];
  contains?: SchemaNode;
  minItems?: number;
  maxItems?: number;
  minContains?: number;
  maxContains?: number;
  uniqueItems?: boolean;
  unevaluatedItems?: SchemaNode | boolean;
}

export interface ObjectKeywords<M extends SchemaNode = SchemaNode>
  extends BaseKeywords,
    CompositionKeywords<M> {
  properties?: Readonly<Record<string, SchemaNode>>;
  patternProperties?: Readonly<Record<string, SchemaNode>>;
  additionalProperties?: SchemaNode | boolean;
  unevaluatedProperties?: SchemaNode | boolean;
  required?: readonly string[];
  propertyNames?: SchemaNode;
  minProperties?: number;
  maxProperties?: number;
  dependentRequired?: Readonly<Record<string, readonly string[]>>;
  dependentSchemas?: Readonly<Record<string, SchemaNode>>;
}

export interface MetaSchemaKeywords extends BaseKeywords {
  $id: string;
  $vocabulary: Readonly<Record<string, boolean>>;
  allOf?: readonly SchemaNode[];
}

export interface StringKeywords extends BaseKeywords {
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  format?: string;
  enum?: readonly string[];
  const?: string;
  default?: string;
}

export interface NumericKeywords extends BaseKeywords {
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
  enum?: readonly number[];
  const?: number;
  default?: number;
}

export interface BooleanKeywords extends BaseKeywords {
  const?: boolean;
  default?: boolean;
}
