export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Plain data object: an object literal or an Object.create(null) map.
 * Class instances (schema nodes included), arrays and boxed values are excluded.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether a value survives JSON encoding unchanged: finite numbers only,
 * no undefined, functions, symbols, bigints or cycles.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  return checkJson(value, new Set());
}

function checkJson(value: unknown, ancestors: Set<object>): boolean {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'object') return false;

  if (ancestors.has(value)) return false;
  if (!Array.isArray(value) && !isPlainObject(value)) return false;

  ancestors.add(value);
  const children: unknown[] = Array.isArray(value)
    ? value
    : Object.values(value);
  const valid = children.every((child) => checkJson(child, ancestors));
  ancestors.delete(value);
  return valid;
}

/**
 * Copy of a value in which every array and plain object reachable from it is
 * rebuilt and frozen. Other objects (schema nodes, class instances) are shared
 * as they are, and the input is left untouched.
 */
export function frozenCopy<T>(value: T): T;
export function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => frozenCopy(item)));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      // defineProperty keeps a '__proto__' key an own data property
      Object.defineProperty(copy, key, {
        value: frozenCopy(item),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return Object.freeze(copy);
  }
  return value;
}
