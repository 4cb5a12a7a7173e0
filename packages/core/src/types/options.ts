/**
 * Configuration options for schema construction
 *
 * All options are optional; the defaults reproduce the plain keyword rules
 * with no extra restrictions.
 */

/**
 * Safety guards against runaway nesting
 */
export interface GuardsOptions {
  /** Maximum nesting depth of a node tree, leaf = 1 (default: 128) */
  maxDepth?: number;
}

/**
 * Regular expression handling for patternProperties keys and pattern
 */
export interface PatternOptions {
  /** Flags passed to RegExp when checking a pattern compiles (default: 'u') */
  flags?: string;
}

/**
 * Where $vocabulary may appear.
 * - 'allow': on any node; restricting it to meta-schema roots is left to the caller
 * - 'meta-only': only on MetaSchemaNode
 */
export type VocabularyPolicy = 'allow' | 'meta-only';

export interface BuildOptions {
  guards?: GuardsOptions;
  patterns?: PatternOptions;
  vocabulary?: VocabularyPolicy;
}

export interface ResolvedBuildOptions {
  guards: Required<GuardsOptions>;
  patterns: Required<PatternOptions>;
  vocabulary: VocabularyPolicy;
}

export const DEFAULT_BUILD_OPTIONS: ResolvedBuildOptions = {
  guards: {
    maxDepth: 128,
  },
  patterns: {
    flags: 'u',
  },
  vocabulary: 'allow',
};

const VALID_REGEX_FLAGS = /^[dgimsuvy]*$/;

/**
 * Resolves partial user options into a complete configuration
 *
 * @throws {Error} When an option holds a value no construction could use
 */
export function resolveBuildOptions(
  userOptions: BuildOptions = {}
): ResolvedBuildOptions {
  const resolved: ResolvedBuildOptions = {
    guards: { ...DEFAULT_BUILD_OPTIONS.guards, ...userOptions.guards },
    patterns: { ...DEFAULT_BUILD_OPTIONS.patterns, ...userOptions.patterns },
    vocabulary: userOptions.vocabulary ?? DEFAULT_BUILD_OPTIONS.vocabulary,
  };

  validateBuildOptions(resolved);

  return resolved;
}

function validateBuildOptions(options: ResolvedBuildOptions): void {
  const { maxDepth } = options.guards;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new Error(
      `guards.maxDepth must be a positive integer, got ${String(maxDepth)}`
    );
  }

  const { flags } = options.patterns;
  if (!VALID_REGEX_FLAGS.test(flags)) {
    throw new Error(`patterns.flags contains unknown flags: '${flags}'`);
  }
  if (flags.includes('u') && flags.includes('v')) {
    throw new Error("patterns.flags cannot combine 'u' and 'v'");
  }

  if (options.vocabulary !== 'allow' && options.vocabulary !== 'meta-only') {
    throw new Error(
      `vocabulary must be 'allow' or 'meta-only', got '${String(options.vocabulary)}'`
    );
  }
}
