/**
 * The capability every schema node variant shares: it can be recognised,
 * it knows its nesting depth and it can list its keywords in canonical
 * order for the serializer.
 */

import { isPlainObject, type JsonObject, type JsonPrimitive } from '../util/json';

export const SCHEMA_NODE = Symbol('schemawright.node');

export type SchemaFamily =
  | 'generic'
  | 'meta'
  | 'array'
  | 'object'
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'null';

/**
 * Anything a keyword slot may hold once validated
 */
export type SerializableValue =
  | JsonPrimitive
  | SchemaNode
  | readonly SerializableValue[]
  | { readonly [key: string]: SerializableValue };

/** Canonical keyword spelling paired with its value; undefined = not set. */
export type KeywordEntry = readonly [
  keyword: string,
  value: SerializableValue | undefined,
];

export interface SerializableSchema {
  keywordEntries(): readonly KeywordEntry[];
}

export interface SchemaNode extends SerializableSchema {
  readonly [SCHEMA_NODE]: true;
  readonly family: SchemaFamily;
  /** 1 for a node without nested nodes */
  readonly depth: number;
  toJSON(): JsonObject;
}

export function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && SCHEMA_NODE in value;
}

export function isSerializableList(
  value: SerializableValue
): value is readonly SerializableValue[] {
  return Array.isArray(value);
}

/**
 * Deepest schema node reachable from a keyword value without descending
 * into the nodes themselves.
 */
export function nestedDepth(value: unknown): number {
  if (isSchemaNode(value)) return value.depth;
  let children: unknown[];
  if (Array.isArray(value)) {
    children = value;
  } else if (isPlainObject(value)) {
    children = Object.values(value);
  } else {
    return 0;
  }
  let deepest = 0;
  for (const child of children) {
    deepest = Math.max(deepest, nestedDepth(child));
  }
  return deepest;
}
