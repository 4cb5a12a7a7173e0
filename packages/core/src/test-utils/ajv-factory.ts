import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import type { JsonObject } from '../util/json';

let ajvInstance: Ajv2020 | undefined;

/**
 * Shared 2020-12 Ajv instance used as an oracle for serialized documents
 */
export function getAjv(): Ajv2020 {
  if (ajvInstance === undefined) {
    ajvInstance = new Ajv2020({ allErrors: true, validateFormats: true });
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

/**
 * Check a serialized document against the 2020-12 meta-schema
 */
export function checkMetaSchema(document: JsonObject): {
  valid: boolean;
  errors?: unknown[];
} {
  const ajv = getAjv();
  const valid = ajv.validateSchema(document) === true;
  return { valid, errors: valid ? undefined : (ajv.errors ?? undefined) };
}

/**
 * Compile a serialized document and validate one instance with it
 */
export function validateInstance(document: JsonObject, data: unknown): boolean {
  const validate = getAjv().compile(document);
  return validate(data);
}
