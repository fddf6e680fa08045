/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[] };

const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema root is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function schemaKey(schema: object): string {
  const id = '$id' in schema ? schema.$id : undefined;
  return typeof id === 'string' && id !== '' ? id : JSON.stringify(schema);
}

function compile(schema: object): ValidateFunction {
  const key = schemaKey(schema);
  const cached = schemaCache.get(key);
  if (cached) {
    return cached;
  }
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const validate = new Ajv({ strict: true, allErrors: true }).compile(schema);
  schemaCache.set(key, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 *
 * Error messages are `<instance path>: <message>`, with the path written
 * as dotted keys (`commands.next_task`), or `(root)` for the document.
 *
 * @example
 * ```typescript
 * const result = validateWithSchema(parsed, schema, isTrudgerConfig);
 * if (!result.valid) console.error(result.errors.join('\n'));
 * ```
 */
export function validateWithSchema<T>(
  data: unknown,
  schema: object,
  isValid: (value: unknown) => value is T
): ValidationResult<T> {
  const validate = compile(schema);

  if (validate(data) && isValid(data)) {
    return { valid: true, data, errors: [] };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath === '' ? '(root)' : error.instancePath.slice(1).replace(/\//g, '.');
    errors.push(`${path}: ${error.message ?? 'validation error'}`);
  }
  if (errors.length === 0) {
    errors.push('(root): validation error');
  }
  return { valid: false, data: null, errors };
}
