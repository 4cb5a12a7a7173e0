/**
 * Error hierarchy for schema construction
 * Every rule failure carries the keyword it concerns, the offending value and
 * a stable code, so callers can report it without parsing messages.
 */

import {
  ErrorCode,
  getErrorKind,
  type ConstraintErrorCode,
  type ErrorKind,
  type ShapeErrorCode,
} from '../errors/codes';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  schemaPath?: string; // JSON pointer of the offending keyword (e.g. '/properties/name')
  expected?: string; // Human-readable description of the accepted value kind
  limit?: number; // Configured limit that was exceeded
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  kind: ErrorKind;
  keyword?: string;
  rule: string;
  value?: unknown;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  keyword?: string;
}

export interface SchemaBuildErrorParams<C extends ErrorCode = ErrorCode> {
  message: string;
  errorCode: C;
  keyword?: string;
  value?: unknown;
  rule?: string;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for every construction failure
 */
export abstract class SchemaBuildError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly keyword?: string;
  public readonly value?: unknown;
  /** Short identifier of the violated rule, e.g. `range:minItems<=maxItems` */
  public readonly rule: string;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: SchemaBuildErrorParams) {
    const { message, errorCode, keyword, value, rule, context, cause } =
      params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.kind = getErrorKind(errorCode);
    this.keyword = keyword;
    this.value = value;
    this.rule = rule ?? errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack and the offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      kind: this.kind,
      keyword: this.keyword,
      rule: this.rule,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.value = this.value;
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      keyword: this.keyword,
    };
  }
}

/**
 * A keyword received a value of the wrong fundamental kind
 */
export class ShapeError extends SchemaBuildError {
  constructor(
    params: Omit<SchemaBuildErrorParams<ShapeErrorCode>, 'errorCode'> & {
      errorCode?: ShapeErrorCode;
    }
  ) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_KIND });
  }

  get expected(): string | undefined {
    const expected = this.context?.expected;
    return typeof expected === 'string' ? expected : undefined;
  }
}

/**
 * A keyword value has the right kind but breaks a rule
 */
export class ConstraintViolation extends SchemaBuildError {
  constructor(params: SchemaBuildErrorParams<ConstraintErrorCode>) {
    super(params);
  }
}

export function isSchemaBuildError(error: unknown): error is SchemaBuildError {
  return error instanceof SchemaBuildError;
}
