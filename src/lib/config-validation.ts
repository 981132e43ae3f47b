/**
 * Config Validation Module
 *
 * Validates .fmtgaterc configuration files against the JSON schema.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type { FmtGateConfig } from './config.js';
import { ConfigurationError } from './errors.js';

/**
 * Validation error with path and message
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Result of config validation
 */
export type ValidationResult =
  | { valid: true; config: FmtGateConfig; errors: [] }
  | { valid: false; errors: ValidationError[] };

/**
 * Location of the published schema, relative to this module (src/lib or dist/lib)
 */
export const SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/fmtgaterc.schema.json', import.meta.url)
);

let compiled: ValidateFunction<FmtGateConfig> | null = null;

/**
 * Load the schema file from disk
 */
export function loadSchema(schemaPath: string = SCHEMA_PATH): SchemaObject {
  try {
    const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf8'));
    return schema;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot load config schema: ${message}`, { configFile: schemaPath });
  }
}

function getValidator(): ValidateFunction<FmtGateConfig> {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: true });
    compiled = ajv.compile<FmtGateConfig>(loadSchema());
  }
  return compiled;
}

function toValidationError(error: ErrorObject): ValidationError {
  let message = error.message ?? 'is invalid';
  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params.additionalProperty;
    message = `unknown key "${String(extra)}"`;
  }
  return {
    path: error.instancePath || '/',
    message,
  };
}

/**
 * Validate a parsed config object
 */
export function validateConfig(config: unknown): ValidationResult {
  const validate = getValidator();
  if (validate(config)) {
    return { valid: true, config, errors: [] };
  }
  return {
    valid: false,
    errors: (validate.errors ?? []).map(toValidationError),
  };
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
}
