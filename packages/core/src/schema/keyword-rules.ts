/**
 * Keyword rules shared by every node family
 *
 * Each check throws the first violation it finds. The expect* functions
 * guard the value kind (ShapeError); the require* functions guard the value
 * itself (ConstraintViolation). Values are read as `unknown` so untyped
 * callers get the same treatment as typed ones.
 */

import { ErrorCode } from '../errors/codes';
import { ConstraintViolation, ShapeError } from '../types/errors';
import { isPlainObject } from '../util/json';
import { isUri, isUriReference } from '../util/uri';
import { isSchemaNode, type SchemaNode } from './node';

const ANCHOR_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

/** RFC 6901 pointer built from raw segments */
export function pointer(...segments: string[]): string {
  return segments
    .map((segment) => `/${segment.replace(/~/g, '~0').replace(/\//g, '~1')}`)
    .join('');
}

function shapeError(
  keyword: string,
  value: unknown,
  expected: string,
  path: string = pointer(keyword)
): ShapeError {
  return new ShapeError({
    message: `${keyword} must be ${expected}`,
    keyword,
    value,
    rule: `kind:${keyword}`,
    context: { schemaPath: path, expected },
  });
}

// ---------------------------------------------------------------------------
// Value kinds
// ---------------------------------------------------------------------------

export function expectString(
  keyword: string,
  value: unknown
): asserts value is string {
  if (typeof value !== 'string') {
    throw shapeError(keyword, value, 'a string');
  }
}

export function expectBoolean(
  keyword: string,
  value: unknown
): asserts value is boolean {
  if (typeof value !== 'boolean') {
    throw shapeError(keyword, value, 'a boolean');
  }
}

export function expectInteger(
  keyword: string,
  value: unknown
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw shapeError(keyword, value, 'an integer');
  }
}

export function expectFiniteNumber(
  keyword: string,
  value: unknown
): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw shapeError(keyword, value, 'a finite number');
  }
}

export function expectList(
  keyword: string,
  value: unknown
): asserts value is readonly unknown[] {
  if (!Array.isArray(value)) {
    throw shapeError(keyword, value, 'a list');
  }
}

export function expectMap(
  keyword: string,
  value: unknown
): asserts value is Readonly<Record<string, unknown>> {
  if (!isPlainObject(value)) {
    throw shapeError(keyword, value, 'a map of string keys');
  }
}

export function expectNode(
  keyword: string,
  value: unknown,
  path?: string
): asserts value is SchemaNode {
  if (!isSchemaNode(value)) {
    throw shapeError(keyword, value, 'a schema node', path);
  }
}

export function expectNodeOrBoolean(keyword: string, value: unknown): void {
  if (typeof value !== 'boolean' && !isSchemaNode(value)) {
    throw shapeError(keyword, value, 'a schema node or a boolean');
  }
}

/**
 * Node of a specific family. A value that is not a node at all is an
 * INVALID_KIND error; a node of another family is INVALID_FAMILY.
 */
export function expectFamilyNode<N extends SchemaNode>(
  keyword: string,
  value: unknown,
  isFamily: (node: SchemaNode) => node is N,
  familyName: string,
  path: string = pointer(keyword)
): asserts value is N {
  if (!isSchemaNode(value)) {
    throw shapeError(keyword, value, `${familyName}`, path);
  }
  if (!isFamily(value)) {
    throw new ShapeError({
      message: `${keyword} must be ${familyName}, got a schema node of family '${value.family}'`,
      errorCode: ErrorCode.INVALID_FAMILY,
      keyword,
      value,
      rule: `family:${keyword}`,
      context: { schemaPath: path, expected: familyName },
    });
  }
}

// ---------------------------------------------------------------------------
// Value constraints
// ---------------------------------------------------------------------------

export function requireNonBlank(
  keyword: string,
  value: string,
  subject: string = keyword,
  path: string = pointer(keyword)
): void {
  if (value.trim() === '') {
    throw new ConstraintViolation({
      message: `${subject} must be a non-empty string`,
      errorCode: ErrorCode.BLANK_STRING,
      keyword,
      value,
      rule: `non-blank:${keyword}`,
      context: { schemaPath: path },
    });
  }
}

export function requireUri(
  keyword: string,
  value: string,
  subject: string = keyword,
  path: string = pointer(keyword)
): void {
  if (!isUri(value)) {
    throw new ConstraintViolation({
      message: `${subject} must be a valid URI: ${value}`,
      errorCode: ErrorCode.INVALID_URI,
      keyword,
      value,
      rule: `uri:${keyword}`,
      context: { schemaPath: path },
    });
  }
}

export function requireUriReference(keyword: string, value: string): void {
  if (!isUriReference(value)) {
    throw new ConstraintViolation({
      message: `${keyword} must be a valid URI reference: ${value}`,
      errorCode: ErrorCode.INVALID_URI_REFERENCE,
      keyword,
      value,
      rule: `uri-reference:${keyword}`,
      context: { schemaPath: pointer(keyword) },
    });
  }
}

export function requireAnchorName(keyword: string, value: string): void {
  if (value.includes('#') || !ANCHOR_PATTERN.test(value)) {
    throw new ConstraintViolation({
      message: `${keyword} must be a valid fragment identifier (no '#'): ${value}`,
      errorCode: ErrorCode.INVALID_ANCHOR,
      keyword,
      value,
      rule: `anchor:${keyword}`,
      context: { schemaPath: pointer(keyword) },
    });
  }
}

/**
 * Checks that `pattern` compiles as a regular expression with the given flags
 */
export function requireCompilablePattern(
  keyword: string,
  pattern: string,
  flags: string,
  path: string = pointer(keyword)
): void {
  try {
    new RegExp(pattern, flags);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    throw new ConstraintViolation({
      message: `${keyword} must be a valid regular expression: ${error.message}`,
      errorCode: ErrorCode.INVALID_PATTERN,
      keyword,
      value: pattern,
      rule: `regex:${keyword}`,
      context: { schemaPath: path },
      cause: error,
    });
  }
}

export function requireNonNegative(keyword: string, value: number): void {
  if (value < 0) {
    throw new ConstraintViolation({
      message: `${keyword} must be non-negative`,
      errorCode: ErrorCode.NEGATIVE_BOUND,
      keyword,
      value,
      rule: `non-negative:${keyword}`,
      context: { schemaPath: pointer(keyword) },
    });
  }
}

/**
 * Lower bound must not exceed upper bound when both are set
 */
export function requireOrderedRange(
  minKeyword: string,
  min: number | undefined,
  maxKeyword: string,
  max: number | undefined
): void {
  if (min === undefined || max === undefined || min <= max) return;
  throw new ConstraintViolation({
    message: `${minKeyword} cannot be greater than ${maxKeyword}`,
    errorCode: ErrorCode.INVERTED_RANGE,
    keyword: minKeyword,
    value: { [minKeyword]: min, [maxKeyword]: max },
    rule: `range:${minKeyword}<=${maxKeyword}`,
    context: { schemaPath: pointer(minKeyword) },
  });
}

/**
 * Optional non-negative integer pair, e.g. minItems/maxItems
 */
export function checkCountRange(
  minKeyword: string,
  min: unknown,
  maxKeyword: string,
  max: unknown
): void {
  if (min !== undefined) {
    expectInteger(minKeyword, min);
    requireNonNegative(minKeyword, min);
  }
  if (max !== undefined) {
    expectInteger(maxKeyword, max);
    requireNonNegative(maxKeyword, max);
  }
  requireOrderedRange(
    minKeyword,
    typeof min === 'number' ? min : undefined,
    maxKeyword,
    typeof max === 'number' ? max : undefined
  );
}

export function requireNonEmpty(
  keyword: string,
  list: readonly unknown[],
  subject: string,
  path: string = pointer(keyword)
): void {
  if (list.length === 0) {
    throw new ConstraintViolation({
      message: `${keyword} must contain at least one ${subject}`,
      errorCode: ErrorCode.EMPTY_SEQUENCE,
      keyword,
      value: list,
      rule: `non-empty:${keyword}`,
      context: { schemaPath: path },
    });
  }
}

/**
 * At most one keyword of a group may be set
 */
export function requireAtMostOne(
  group: Readonly<Record<string, unknown>>,
  message: string
): void {
  const present = Object.keys(group).filter((key) => group[key] !== undefined);
  if (present.length > 1) {
    throw new ConstraintViolation({
      message,
      errorCode: ErrorCode.MUTUALLY_EXCLUSIVE,
      keyword: present[1],
      value: present,
      rule: `exclusive:${Object.keys(group).join('|')}`,
      context: { schemaPath: pointer(present[1] ?? '') },
    });
  }
}

export function requireCompanion(
  keyword: string,
  companion: string,
  companionValue: unknown,
  message: string = `${keyword} requires ${companion} to be specified`
): void {
  if (companionValue === undefined) {
    throw new ConstraintViolation({
      message,
      errorCode: ErrorCode.MISSING_DEPENDENCY,
      keyword,
      rule: `requires:${keyword}->${companion}`,
      context: { schemaPath: pointer(keyword) },
    });
  }
}

// ---------------------------------------------------------------------------
// Composite checks
// ---------------------------------------------------------------------------

/**
 * Optional string that must not be blank
 */
export function checkNonBlankString(keyword: string, value: unknown): void {
  if (value === undefined) return;
  expectString(keyword, value);
  requireNonBlank(keyword, value);
}

/**
 * Non-empty list of distinct, non-blank property names
 */
export function checkNameList(
  keyword: string,
  value: unknown,
  path: string = pointer(keyword)
): asserts value is readonly string[] {
  if (!Array.isArray(value)) {
    throw shapeError(keyword, value, 'a list', path);
  }
  requireNonEmpty(keyword, value, 'property name', path);

  const seen = new Set<string>();
  for (const name of value) {
    if (typeof name !== 'string') {
      throw shapeError(keyword, name, 'a list of strings', path);
    }
    requireNonBlank(keyword, name, `${keyword} property names`, path);
    if (seen.has(name)) {
      throw new ConstraintViolation({
        message: `${keyword} must not repeat property name '${name}'`,
        errorCode: ErrorCode.DUPLICATE_ENTRY,
        keyword,
        value: name,
        rule: `unique:${keyword}`,
        context: { schemaPath: path },
      });
    }
    seen.add(name);
  }
}

/**
 * Map with non-blank keys; `checkEntry` validates each value
 */
export function checkKeyedMap(
  keyword: string,
  value: unknown,
  checkEntry: (key: string, entry: unknown, path: string) => void
): asserts value is Readonly<Record<string, unknown>> {
  expectMap(keyword, value);
  for (const [key, entry] of Object.entries(value)) {
    const path = pointer(keyword, key);
    requireNonBlank(keyword, key, `${keyword} keys`, path);
    checkEntry(key, entry, path);
  }
}

/**
 * Map from non-blank keys to schema nodes
 */
export function checkNodeMap(keyword: string, value: unknown): void {
  if (value === undefined) return;
  checkKeyedMap(keyword, value, (_key, entry, path) => {
    expectNode(keyword, entry, path);
  });
}

/**
 * Non-empty list whose members all satisfy `isMember`
 */
export function checkNodeList<N extends SchemaNode>(
  keyword: string,
  value: unknown,
  isMember: (node: SchemaNode) => node is N,
  memberName: string
): void {
  if (value === undefined) return;
  expectList(keyword, value);
  requireNonEmpty(keyword, value, 'schema');
  value.forEach((member, index) => {
    expectFamilyNode(
      keyword,
      member,
      isMember,
      memberName,
      pointer(keyword, String(index))
    );
  });
}

/**
 * not/if/then/else: each an optional member node; then/else need if
 */
export function checkConditionals<N extends SchemaNode>(
  keywords: {
    readonly not?: unknown;
    readonly if?: unknown;
    readonly then?: unknown;
    readonly else?: unknown;
  },
  isMember: (node: SchemaNode) => node is N,
  memberName: string
): void {
  if (keywords.not !== undefined) {
    expectFamilyNode('not', keywords.not, isMember, memberName);
  }
  if (keywords.then !== undefined || keywords.else !== undefined) {
    requireCompanion(
      keywords.then !== undefined ? 'then' : 'else',
      'if',
      keywords.if,
      "'then' and 'else' require 'if' to be specified"
    );
  }
  for (const keyword of ['if', 'then', 'else'] as const) {
    const value = keywords[keyword];
    if (value !== undefined) {
      expectFamilyNode(keyword, value, isMember, memberName);
    }
  }
}

export const anySchemaNode = (_node: SchemaNode): _node is SchemaNode => true;
