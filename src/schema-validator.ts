/**
 * Schema Validator - Validates output documents against JSON Schemas.
 *
 * Schemas live in the repository's `schemas/` directory as
 * `<name>.schema.json` and are compiled once with AJV. Every document the
 * tool writes for external consumers is checked here first, so a viewer
 * never receives a partial or misshapen file.
 *
 * @module schema-validator
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';

/** Directory holding `<name>.schema.json` files. */
export const SCHEMAS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'schemas');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ValidationResult {
  /** Whether validation succeeded. */
  valid: boolean;
  /** Human-readable error messages (empty on success). */
  errors: string[];
}

/**
 * Schema validation error
 */
export class SchemaValidationError extends Error {
  public readonly schemaName: string;
  public readonly validationErrors: string[];

  constructor(schemaName: string, errors: string[]) {
    super(`Schema validation failed for '${schemaName}':\n  ${errors.join('\n  ')}`);
    this.name = 'SchemaValidationError';
    this.schemaName = schemaName;
    this.validationErrors = errors;
  }
}

// ---------------------------------------------------------------------------
// AJV
// ---------------------------------------------------------------------------

let ajvInstance: Ajv | null = null;
const compiled = new Map<string, ValidateFunction>();

function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({ allErrors: true, strict: false });
  }
  return ajvInstance;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAjvError(error: ErrorObject): string {
  const location = error.instancePath || '(root)';
  return `${location}: ${error.message ?? 'invalid'}`;
}

/**
 * Load and compile `<name>.schema.json`, caching the compiled validator.
 *
 * @throws if the schema file is missing or does not compile.
 */
function getValidator(schemaName: string, schemasDir: string): ValidateFunction {
  const cacheKey = path.join(schemasDir, schemaName);
  const cached = compiled.get(cacheKey);
  if (cached) return cached;

  const schemaPath = path.join(schemasDir, `${schemaName}.schema.json`);
  if (!fs.existsSync(schemaPath)) {
    throw new Error(`Unknown schema '${schemaName}': ${schemaPath} not found`);
  }

  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (!isJsonObject(schema)) {
    throw new Error(`Schema '${schemaName}' is not a JSON object`);
  }

  const validate = getAjv().compile(schema);
  compiled.set(cacheKey, validate);
  return validate;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate parsed data against a named schema.
 */
export function validateData(
  schemaName: string,
  data: unknown,
  schemasDir: string = SCHEMAS_DIR,
): ValidationResult {
  const validate = getValidator(schemaName, schemasDir);
  if (validate(data)) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: (validate.errors ?? []).map(formatAjvError) };
}

/**
 * Validate and throw on failure.
 *
 * @throws {SchemaValidationError}
 */
export function assertValid(
  schemaName: string,
  data: unknown,
  schemasDir: string = SCHEMAS_DIR,
): void {
  const result = validateData(schemaName, data, schemasDir);
  if (!result.valid) {
    throw new SchemaValidationError(schemaName, result.errors);
  }
}

/**
 * Write JSON file with schema validation
 */
export function writeValidatedJson(
  filePath: string,
  data: unknown,
  schemaName: string,
  schemasDir: string = SCHEMAS_DIR,
): void {
  assertValid(schemaName, data, schemasDir);

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  fs.renameSync(tmpPath, filePath);
}
