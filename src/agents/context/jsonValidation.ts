import Ajv, { type ValidateFunction } from 'ajv';
import { jsonrepair } from 'jsonrepair';
import type { JsonSchema } from '../../configManager.js';

const ajv = new Ajv({ allErrors: true, strict: false });

export interface JsonErrorDetail {
  path: string;
  message: string;
}

export type JsonValidationResult<T> =
  | { valid: true; parsed: T; repaired: boolean }
  | { valid: false; parsed: unknown; errors: string[]; errorDetails?: JsonErrorDetail[]; repaired: boolean };

/** Type guard for a schema given inline or as JSON text. */
export function compileSchema<T>(schema: string | JsonSchema): ValidateFunction<T> {
  const parsedSchema: JsonSchema = typeof schema === 'string' ? JSON.parse(schema) : schema;
  return ajv.compile<T>(parsedSchema);
}

export function tryJsonRepair(input: string): string | null {
  try {
    return jsonrepair(input);
  } catch {
    return null;
  }
}

function parseWithRepair(raw: string): { ok: true; value: unknown; repaired: boolean } | { ok: false; repaired: boolean } {
  try {
    return { ok: true, value: JSON.parse(raw), repaired: false };
  } catch {
    const repairedText = tryJsonRepair(raw);
    if (repairedText === null) return { ok: false, repaired: false };
    try {
      return { ok: true, value: JSON.parse(repairedText), repaired: true };
    } catch {
      return { ok: false, repaired: true };
    }
  }
}

/**
 * Parses an LLM response (repairing it when plain parsing fails) and checks it
 * against `validator`.
 */
export function validateJson<T>(raw: string, validator: ValidateFunction<T>): JsonValidationResult<T> {
  const parsed = parseWithRepair(raw);
  if (!parsed.ok) {
    return { valid: false, parsed: null, errors: ['parse_failed'], repaired: parsed.repaired };
  }

  const value = parsed.value;
  if (validator(value)) {
    return { valid: true, parsed: value, repaired: parsed.repaired };
  }

  const validationErrors = validator.errors || [];
  const errors = validationErrors.map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
  const errorDetails = validationErrors.map(err => ({ path: err.instancePath || '(root)', message: err.message || '' }));
  return { valid: false, parsed: value, errors, errorDetails, repaired: parsed.repaired };
}
