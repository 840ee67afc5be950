/**
 * Configuration validation
 * Validates config against the JSON Schema with ajv and reports unknown keys
 * as warnings with "did you mean" hints
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { OpskitConfig } from './loader.js';
import { CONFIG_SCHEMA, getSchemaForPath, isSchemaField, schemaChildren, type SchemaObject } from './schema.js';
import { getCategoryJsonSchema, toJsonSchema } from './json-schema.js';
import { configError } from '../cli/errors.js';
import { didYouMean } from '../cli/help.js';

export interface ValidationError {
  path: string;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile<OpskitConfig>(toJsonSchema());

function pointerToPath(instancePath: string): string {
  return instancePath.replace(/^\//, '').split('/').join('.');
}

function toValidationError(error: ErrorObject, basePath = ''): ValidationError {
  const relative = pointerToPath(error.instancePath);
  const path = [basePath, relative].filter((p) => p.length > 0).join('.') || '(root)';
  const result: ValidationError = { path, message: error.message ?? 'is invalid' };

  const allowed: unknown = error.params.allowedValues;
  if (error.keyword === 'enum' && Array.isArray(allowed)) {
    result.suggestion = `Valid options: ${allowed.join(', ')}`;
  } else if (error.keyword === 'type') {
    result.suggestion = `Value should be a ${String(error.params.type)}`;
  } else if (error.keyword === 'required') {
    result.suggestion = `Add the "${String(error.params.missingProperty)}" field`;
  }

  return result;
}

function collectUnknownKeys(
  config: Record<string, unknown>,
  schema: SchemaObject,
  path: string,
  warnings: ValidationError[]
): void {
  const children = schemaChildren(schema);
  const knownKeys = children.map(([key]) => key);

  for (const [key, value] of Object.entries(config)) {
    const fullPath = path ? `${path}.${key}` : key;
    const entry = children.find(([k]) => k === key)?.[1];

    if (!entry) {
      warnings.push({
        path: fullPath,
        message: `Unknown configuration key "${key}"`,
        suggestion: didYouMean(key, knownKeys) ?? `Known keys: ${knownKeys.join(', ')}`,
      });
      continue;
    }

    if (!isSchemaField(entry) && value !== null && typeof value === 'object' && !Array.isArray(value)) {
      collectUnknownKeys(Object.fromEntries(Object.entries(value)), entry, fullPath, warnings);
    }
  }
}

/**
 * Validate configuration against schema
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationError[] = [];

  if (!validateSchema(config)) {
    for (const error of validateSchema.errors ?? []) {
      errors.push(toValidationError(error));
    }
  }

  if (config !== null && typeof config === 'object' && !Array.isArray(config)) {
    collectUnknownKeys(Object.fromEntries(Object.entries(config)), CONFIG_SCHEMA, '', warnings);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw a CONFIG_ERROR listing every schema violation
 */
export function assertValidConfig<T>(config: T): asserts config is T & OpskitConfig {
  if (validateSchema(config)) {
    return;
  }
  const errors = (validateSchema.errors ?? []).map((e) => toValidationError(e));
  throw configError(
    `Invalid configuration: ${errors.map((e) => `${e.path} ${e.message}`).join('; ')}`,
    { errors }
  );
}

/**
 * Format validation results for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.valid && result.warnings.length === 0) {
    return 'Configuration is valid.';
  }

  if (result.errors.length > 0) {
    lines.push('ERRORS:');
    for (const error of result.errors) {
      lines.push(`  ${error.path}: ${error.message}`);
      if (error.suggestion) {
        lines.push(`    → ${error.suggestion}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (result.errors.length > 0) lines.push('');
    lines.push('WARNINGS:');
    for (const warning of result.warnings) {
      lines.push(`  ${warning.path}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    → ${warning.suggestion}`);
      }
    }
  }

  return lines.join('\n');
}

/**
 * Validate a single config value
 */
export function validateValue(path: string, value: unknown): ValidationError | null {
  const node = getSchemaForPath(path);
  if (!node || !isSchemaField(node)) {
    return {
      path,
      message: `"${path}" is not a valid configuration key`,
    };
  }

  const schema = getCategoryJsonSchema(path);
  if (!schema) {
    return { path, message: `"${path}" is not a valid configuration key` };
  }
  const validate = ajv.compile(schema);
  if (validate(value)) {
    return null;
  }
  const [first] = validate.errors ?? [];
  return first ? toValidationError(first, path) : { path, message: 'is invalid' };
}

/**
 * Parse a string value to the correct type based on schema
 */
export function parseValue(path: string, stringValue: string): unknown {
  const node = getSchemaForPath(path);
  if (!node || !isSchemaField(node)) {
    return stringValue;
  }

  switch (node._type) {
    case 'boolean': {
      const lower = stringValue.trim().toLowerCase();
      if (lower === 'true' || lower === '1' || lower === 'yes') return true;
      if (lower === 'false' || lower === '0' || lower === 'no') return false;
      return stringValue;
    }
    case 'number': {
      const num = Number(stringValue);
      return stringValue.trim() !== '' && !Number.isNaN(num) ? num : stringValue;
    }
    case 'array': {
      const trimmed = stringValue.trim();
      if (trimmed.startsWith('[')) {
        try {
          const parsed: unknown = JSON.parse(trimmed);
          return parsed;
        } catch (error) {
          throw configError(`Invalid JSON array for ${path}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      const items = trimmed === '' ? [] : trimmed.split(',').map((s) => s.trim());
      return node._items === 'number' ? items.map(Number) : items;
    }
    default:
      return stringValue;
  }
}
