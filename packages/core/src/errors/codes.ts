/**
 * Error Code Infrastructure
 * Stable error codes for schema construction failures and the error kind
 * each of them belongs to.
 */

/**
 * `shape`: the value has the wrong fundamental kind (a string where a list of
 * nodes was expected, a node of the wrong family).
 * `constraint`: the kind is right but the value breaks a keyword rule.
 */
export type ErrorKind = 'shape' | 'constraint';

// Stable error codes grouped by kind
export enum ErrorCode {
  // Shape errors (E001–E099)
  INVALID_KIND = 'E001',
  INVALID_FAMILY = 'E002',

  // Constraint violations (E100–E199)
  BLANK_STRING = 'E100',
  INVALID_URI = 'E101',
  INVALID_URI_REFERENCE = 'E102',
  INVALID_ANCHOR = 'E103',
  INVALID_PATTERN = 'E104',
  NEGATIVE_BOUND = 'E110',
  INVERTED_RANGE = 'E111',
  NON_POSITIVE_MULTIPLE = 'E112',
  EMPTY_SEQUENCE = 'E120',
  DUPLICATE_ENTRY = 'E121',
  MUTUALLY_EXCLUSIVE = 'E130',
  MISSING_DEPENDENCY = 'E131',
  UNKNOWN_REQUIRED_PROPERTY = 'E132',
  VOCABULARY_OUTSIDE_META_SCHEMA = 'E133',
  MISSING_META_KEYWORD = 'E134',
  UNKNOWN_KEYWORD = 'E135',
  NESTING_TOO_DEEP = 'E140',
}

export const ERROR_KIND_BY_CODE = {
  [ErrorCode.INVALID_KIND]: 'shape',
  [ErrorCode.INVALID_FAMILY]: 'shape',
  [ErrorCode.BLANK_STRING]: 'constraint',
  [ErrorCode.INVALID_URI]: 'constraint',
  [ErrorCode.INVALID_URI_REFERENCE]: 'constraint',
  [ErrorCode.INVALID_ANCHOR]: 'constraint',
  [ErrorCode.INVALID_PATTERN]: 'constraint',
  [ErrorCode.NEGATIVE_BOUND]: 'constraint',
  [ErrorCode.INVERTED_RANGE]: 'constraint',
  [ErrorCode.NON_POSITIVE_MULTIPLE]: 'constraint',
  [ErrorCode.EMPTY_SEQUENCE]: 'constraint',
  [ErrorCode.DUPLICATE_ENTRY]: 'constraint',
  [ErrorCode.MUTUALLY_EXCLUSIVE]: 'constraint',
  [ErrorCode.MISSING_DEPENDENCY]: 'constraint',
  [ErrorCode.UNKNOWN_REQUIRED_PROPERTY]: 'constraint',
  [ErrorCode.VOCABULARY_OUTSIDE_META_SCHEMA]: 'constraint',
  [ErrorCode.MISSING_META_KEYWORD]: 'constraint',
  [ErrorCode.UNKNOWN_KEYWORD]: 'constraint',
  [ErrorCode.NESTING_TOO_DEEP]: 'constraint',
} as const satisfies Record<ErrorCode, ErrorKind>;

export type ShapeErrorCode = {
  [C in ErrorCode]: (typeof ERROR_KIND_BY_CODE)[C] extends 'shape' ? C : never;
}[ErrorCode];

export type ConstraintErrorCode = Exclude<ErrorCode, ShapeErrorCode>;

export function getErrorKind(code: ErrorCode): ErrorKind {
  return ERROR_KIND_BY_CODE[code];
}
