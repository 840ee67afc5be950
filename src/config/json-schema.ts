/**
 * JSON Schema converter
 * Converts the internal schema tree to standard JSON Schema (draft-07, the
 * dialect ajv compiles by default)
 */

import { CONFIG_SCHEMA, isSchemaField, schemaChildren, getSchemaForPath, type SchemaField, type SchemaObject } from './schema.js';

export type JSONSchema = {
  $schema?: string;
  type: string;
  description?: string;
  properties?: Record<string, JSONSchema>;
  items?: JSONSchema;
  enum?: (string | number | boolean)[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
  required?: string[];
};

export const JSON_SCHEMA_DIALECT = 'http://json-schema.org/draft-07/schema#';

const HOOK_ITEM_SCHEMA: JSONSchema = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string' },
    type: { type: 'string', enum: ['webhook', 'script'] },
    events: { type: 'array', items: { type: 'string' } },
    enabled: { type: 'boolean' },
    url: { type: 'string' },
    method: { type: 'string', enum: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] },
    command: { type: 'string' },
    args: { type: 'array', items: { type: 'string' } },
    cwd: { type: 'string' },
    retry: { type: 'number', minimum: 0, maximum: 10 },
  },
};

function fieldToJsonSchema(field: SchemaField): JSONSchema {
  const result: JSONSchema = {
    type: field._type,
    description: field._description,
  };

  if (field._options && field._options.length > 0) {
    result.enum = [...field._options];
  }
  if (field._default !== undefined) {
    result.default = field._default;
  }
  if (field._min !== undefined) {
    result.minimum = field._min;
  }
  if (field._max !== undefined) {
    result.maximum = field._max;
  }
  if (field._type === 'array' && field._items) {
    result.items = field._items === 'object' ? HOOK_ITEM_SCHEMA : { type: field._items };
  }

  return result;
}

function objectToJsonSchema(obj: SchemaObject): JSONSchema {
  const properties: Record<string, JSONSchema> = {};

  for (const [key, value] of schemaChildren(obj)) {
    properties[key] = isSchemaField(value) ? fieldToJsonSchema(value) : objectToJsonSchema(value);
  }

  const result: JSONSchema = { type: 'object', properties };
  if (obj._description) {
    result.description = obj._description;
  }
  return result;
}

/**
 * Convert the full CONFIG_SCHEMA to JSON Schema format
 */
export function toJsonSchema(): JSONSchema {
  return { $schema: JSON_SCHEMA_DIALECT, ...objectToJsonSchema(CONFIG_SCHEMA) };
}

/**
 * Get JSON Schema for a specific category
 */
export function getCategoryJsonSchema(category: string): JSONSchema | null {
  const node = getSchemaForPath(category);
  if (!node) {
    return null;
  }
  return isSchemaField(node) ? fieldToJsonSchema(node) : objectToJsonSchema(node);
}
