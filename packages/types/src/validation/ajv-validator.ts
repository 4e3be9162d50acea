/**
 * JSON Schema validation of exported canonical records (--strict).
 */

import Ajv from 'ajv';
import type { CanonicalTransactionRecord } from '../fields.js';

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
  params: Record<string, unknown>;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

const FIELD_VALUE = { type: ['string', 'number', 'null'] };

const SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'https://bankstmt.local/schemas/canonical-records.schema.json',
  title: 'Canonical transaction records',
  type: 'array',
  items: {
    type: 'object',
    properties: {
      'transaction date': FIELD_VALUE,
      'transaction amount': { type: 'number' },
      'income amount': { type: 'number' },
      'expense amount': { type: 'number' },
      'account balance': { type: 'number' },
    },
    additionalProperties: FIELD_VALUE,
  },
};

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: AjvValidateFunction | null = null;

function getValidator(): AjvValidateFunction {
  if (compiledValidator === null) {
    // ajv ships CommonJS; under NodeNext its default import is the module object's constructor
    const ajv = new (Ajv as unknown as new (opts: object) => { compile: (schema: object) => AjvValidateFunction })({
      allErrors: true,
    });
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

export function validateOutput(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateAndThrow(output: unknown): asserts output is CanonicalTransactionRecord[] {
  const result = validateOutput(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
