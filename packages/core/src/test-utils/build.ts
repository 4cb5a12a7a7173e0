import { isSchemaBuildError, type SchemaBuildError } from '../types/errors';

/**
 * Construct a node the way an untyped caller would, bypassing the keyword
 * types so wrong value kinds reach the runtime checks
 */
export function buildUntyped(
  node: new (...args: never[]) => object,
  keywords: Readonly<Record<string, unknown>>,
  options?: unknown
): unknown {
  return Reflect.construct(node, [keywords, options]);
}

/**
 * Run a construction expected to fail and return the SchemaBuildError
 */
export function captureBuildError(build: () => unknown): SchemaBuildError {
  try {
    build();
  } catch (error) {
    if (isSchemaBuildError(error)) return error;
    throw error;
  }
  throw new Error('Expected construction to fail with a SchemaBuildError');
}
