import { isSchemaBuildError, type SchemaBuildError } from '../types/errors';
import { err, ok, type Result } from '../types/result';

/**
 * Run a node construction and capture its rule failure as an Err.
 * Anything that is not a SchemaBuildError (bad options, bugs) propagates.
 */
export function tryBuild<T>(build: () => T): Result<T, SchemaBuildError> {
  try {
    return ok(build());
  } catch (error) {
    if (isSchemaBuildError(error)) {
      return err(error);
    }
    throw error;
  }
}
