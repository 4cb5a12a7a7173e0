// @schemawright/core entry point
//
// Public API:
// - Schema node classes (throwing constructors) and their create* factories
//   returning a Result.
// - serializeSchema for the canonical JSON mapping; every node's toJSON
//   delegates to it.
// - Error hierarchy, error codes and build options.

// Nodes
export {
  BaseSchemaNode,
  BASE_KEYWORDS,
  createBaseSchema,
  validateBaseKeywords,
} from './schema/base-schema';
export {
  ArraySchemaNode,
  ARRAY_KEYWORDS,
  createArraySchema,
  isArraySchemaNode,
  type ArraySchemaKeywords,
} from './schema/array-schema';
export {
  ObjectSchemaNode,
  OBJECT_KEYWORDS,
  createObjectSchema,
  type ObjectSchemaKeywords,
} from './schema/object-schema';
export {
  StringSchemaNode,
  NumberSchemaNode,
  IntegerSchemaNode,
  BooleanSchemaNode,
  NullSchemaNode,
  createStringSchema,
  createNumberSchema,
  createIntegerSchema,
  createBooleanSchema,
  createNullSchema,
} from './schema/scalar-schema';
export {
  MetaSchemaNode,
  META_KEYWORDS,
  createMetaSchema,
} from './schema/meta-schema';
export {
  isSchemaNode,
  SCHEMA_NODE,
  type KeywordEntry,
  type SchemaFamily,
  type SchemaNode,
  type SerializableSchema,
  type SerializableValue,
} from './schema/node';

// Serialization
export { serializeSchema } from './schema/serializer';

// Keyword configurations
export type {
  ArrayKeywords,
  BaseKeywords,
  BooleanKeywords,
  CompositionKeywords,
  DefinitionValue,
  MetaSchemaKeywords,
  NumericKeywords,
  ObjectKeywords,
  StringKeywords,
} from './types/keywords';

// Errors
export {
  ErrorCode,
  getErrorKind,
  type ErrorKind,
  type ShapeErrorCode,
  type ConstraintErrorCode,
} from './errors/codes';
export {
  SchemaBuildError,
  ShapeError,
  ConstraintViolation,
  isSchemaBuildError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors';

// Result
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  matchResult,
  type Result,
} from './types/result';

// Options
export {
  DEFAULT_BUILD_OPTIONS,
  resolveBuildOptions,
  type BuildOptions,
  type GuardsOptions,
  type PatternOptions,
  type ResolvedBuildOptions,
  type VocabularyPolicy,
} from './types/options';

export type { JsonObject, JsonPrimitive, JsonValue } from './util/json';
