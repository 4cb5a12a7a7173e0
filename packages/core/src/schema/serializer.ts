import type { JsonObject, JsonValue } from '../util/json';
import {
  isSchemaNode,
  isSerializableList,
  type SerializableSchema,
  type SerializableValue,
} from './node';

/**
 * Serialize a schema node to an ordered mapping of the keywords it sets,
 * in canonical spelling and order. Nested nodes are serialized recursively.
 */
export function serializeSchema(schema: SerializableSchema): JsonObject {
  const result: JsonObject = {};
  for (const [keyword, value] of schema.keywordEntries()) {
    if (value === undefined) continue;
    setEntry(result, keyword, serializeValue(value));
  }
  return result;
}

export function serializeValue(value: SerializableValue): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (isSchemaNode(value)) {
    return serializeSchema(value);
  }
  if (isSerializableList(value)) {
    return value.map(serializeValue);
  }

  const mapped: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    setEntry(mapped, key, serializeValue(entry));
  }
  return mapped;
}

// defineProperty keeps a '__proto__' property name an ordinary key
function setEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
