/**
 * JSON Schema validation of parsed model documents.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';

/** Location of the model schema, relative to this module. */
export const MODEL_SCHEMA_URL = new URL('../../schemas/model.schema.json', import.meta.url);

type ValidateFunction = {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
};

let compiled: ValidateFunction | undefined;

/**
 * Compiles the model schema once and returns the validator.
 */
function getValidator(): ValidateFunction {
  if (compiled === undefined) {
    const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
      compile: (schema: Record<string, unknown>) => ValidateFunction;
    })({
      allErrors: true,
    });
    const schema = JSON.parse(readFileSync(MODEL_SCHEMA_URL, 'utf-8')) as Record<string, unknown>;
    compiled = ajv.compile(schema);
  }
  return compiled;
}

/**
 * Validates a parsed model document against the model schema.
 *
 * @param data - Parsed TOML document.
 * @returns Messages of the form `<path>: <problem>`; empty when valid.
 */
export function validateModelDocument(data: unknown): string[] {
  const validate = getValidator();
  if (validate(data)) {
    return [];
  }
  return (
    validate.errors?.map(
      (e: ErrorObject) => `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'Unknown error'}`
    ) ?? []
  );
}
