import addFormats from 'ajv-formats';

type FormatEntry = ReturnType<typeof addFormats.get>;

function toMatcher(name: string, format: FormatEntry): (value: string) => boolean {
  if (format instanceof RegExp) {
    return (value) => format.test(value);
  }
  if (typeof format === 'function') {
    return format;
  }
  throw new Error(`ajv-formats returned an unsupported definition for '${name}'`);
}

// RFC 3986 grammars as shipped with ajv-formats' full mode
const matchesUri = toMatcher('uri', addFormats.get('uri'));
const matchesUriReference = toMatcher(
  'uri-reference',
  addFormats.get('uri-reference')
);

/** Absolute URI: scheme required, fragment allowed. */
export function isUri(value: string): boolean {
  return matchesUri(value);
}

/** URI or relative reference, e.g. `#/$defs/node` or `item.json`. */
export function isUriReference(value: string): boolean {
  return matchesUriReference(value);
}
