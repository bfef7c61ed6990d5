/**
 * Example value synthesis from resolved schemas
 *
 * Precedence: example, default, enum[0], then a canonical value per type.
 * Objects only get their required properties so generated requests stay
 * minimal.
 */

import { CANONICAL_VALUES, FORMAT_EXAMPLES, MAX_SCHEMA_DEPTH } from './constants.js';
import type { SchemaInfo } from './types/openapi.js';

export function exampleFromSchema(schema: SchemaInfo | undefined, depth = 0): unknown {
  if (!schema || schema.circular || depth >= MAX_SCHEMA_DEPTH) return null;

  if (schema.example !== undefined) return schema.example;
  if (schema.default !== undefined) return schema.default;
  if (schema.enum && schema.enum.length > 0) return schema.enum[0];

  // Composition without an own shape: take the first alternative
  const variant = schema.oneOf?.[0] ?? schema.anyOf?.[0];
  if (variant && !schema.type && !schema.properties && !schema.items) {
    return exampleFromSchema(variant, depth + 1);
  }

  switch (inferType(schema)) {
    case 'string':
      return exampleString(schema);
    case 'integer':
      return exampleNumber(schema, true);
    case 'number':
      return exampleNumber(schema, false);
    case 'boolean':
      return CANONICAL_VALUES.BOOLEAN;
    case 'array':
      return [exampleFromSchema(schema.items ?? { type: 'string' }, depth + 1)];
    case 'object':
      return exampleObject(schema, depth);
    case 'null':
      return null;
    default:
      return CANONICAL_VALUES.STRING;
  }
}

/**
 * True when the schema itself names a value (example or default)
 */
export function hasExplicitExample(schema: SchemaInfo | undefined): boolean {
  return schema !== undefined && (schema.example !== undefined || schema.default !== undefined);
}

function inferType(schema: SchemaInfo): string {
  if (schema.type) return schema.type;
  if (schema.properties) return 'object';
  if (schema.items) return 'array';
  return 'string';
}

function exampleString(schema: SchemaInfo): string {
  let value = (schema.format && FORMAT_EXAMPLES[schema.format]) || CANONICAL_VALUES.STRING;

  if (schema.minLength !== undefined && value.length < schema.minLength) {
    value = value.padEnd(schema.minLength, 'x');
  }
  if (schema.maxLength !== undefined && value.length > schema.maxLength) {
    value = value.slice(0, Math.max(0, schema.maxLength));
  }

  return value;
}

/**
 * Zero unless the bounds exclude it
 */
function exampleNumber(schema: SchemaInfo, integer: boolean): number {
  if (schema.minimum !== undefined && schema.minimum > 0) {
    return integer ? Math.ceil(schema.minimum) : schema.minimum;
  }
  if (schema.maximum !== undefined && schema.maximum < 0) {
    return integer ? Math.floor(schema.maximum) : schema.maximum;
  }
  return integer ? CANONICAL_VALUES.INTEGER : CANONICAL_VALUES.NUMBER;
}

/**
 * Required properties in declared order, then required names the schema
 * lists without declaring them
 */
function exampleObject(schema: SchemaInfo, depth: number): Record<string, unknown> {
  const required = new Set(schema.required ?? []);
  const properties = schema.properties ?? {};
  const result: Record<string, unknown> = {};

  for (const [name, propSchema] of Object.entries(properties)) {
    if (required.has(name)) {
      result[name] = exampleFromSchema(propSchema, depth + 1);
    }
  }

  for (const name of required) {
    if (!(name in properties)) {
      result[name] = exampleFromSchema({}, depth + 1);
    }
  }

  return result;
}
