/**
 * Shared utilities for tool input validation.
 */

import { SchemaError } from '../domains/outreach/errors.js';
import type { FieldSpec, ToolInputSpec } from './types.js';

/**
 * Narrow an unknown tool input to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function matchesType(value: unknown, fieldSpec: FieldSpec): boolean {
  switch (fieldSpec.type) {
    case 'array':
      if (!Array.isArray(value)) return false;
      return fieldSpec.items === 'string' ? isStringArray(value) : true;
    case 'object':
      return isRecord(value);
    default:
      return typeof value === fieldSpec.type;
  }
}

function describeType(fieldSpec: FieldSpec): string {
  if (fieldSpec.type === 'array') {
    return fieldSpec.items ? `an array of ${fieldSpec.items}s` : 'an array';
  }
  return fieldSpec.type === 'object' ? 'an object' : `a ${fieldSpec.type}`;
}

function isBlank(value: unknown): boolean {
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Validate tool input against a specification.
 *
 * Checks run in this order: input shape, undeclared properties, then each
 * declared field in declaration order (presence, type, emptiness, custom
 * validator). The first violation is thrown.
 *
 * @throws SchemaError
 */
export function validateInput(
  input: unknown,
  spec: ToolInputSpec
): Record<string, unknown> {
  if (!isRecord(input)) {
    throw new SchemaError('TypeMismatch', 'Tool input must be an object.');
  }

  for (const key of Object.keys(input)) {
    if (!Object.hasOwn(spec, key)) {
      throw new SchemaError('UnknownProperty', `Unknown property: ${key}.`, key);
    }
  }

  for (const [field, fieldSpec] of Object.entries(spec)) {
    const value = input[field];

    if (value === undefined || value === null) {
      if (fieldSpec.required) {
        throw new SchemaError('MissingRequired', `${field} is required.`, field);
      }
      continue;
    }

    if (!matchesType(value, fieldSpec)) {
      throw new SchemaError('TypeMismatch', `${field} must be ${describeType(fieldSpec)}.`, field);
    }

    // Required strings and arrays must carry content
    const nonEmpty = fieldSpec.nonEmpty ?? fieldSpec.required;
    if (nonEmpty && isBlank(value)) {
      throw new SchemaError('MissingRequired', `${field} must not be empty.`, field);
    }

    if (fieldSpec.validate) {
      const customError = fieldSpec.validate(value);
      if (customError) {
        throw new SchemaError('InvalidValue', customError, field);
      }
    }
  }

  return input;
}

/**
 * Build the JSON schema sent to the model from a field specification.
 * Optional fields are declared nullable; undeclared properties are rejected.
 */
export function toInputSchema(spec: ToolInputSpec): {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
  additionalProperties: false;
} {
  const properties: Record<string, unknown> = {};
  for (const [field, fieldSpec] of Object.entries(spec)) {
    const type = fieldSpec.required ? fieldSpec.type : [fieldSpec.type, 'null'];
    properties[field] = {
      type,
      ...(fieldSpec.items ? { items: { type: fieldSpec.items } } : {}),
      description: fieldSpec.description,
    };
  }

  return {
    type: 'object',
    properties,
    required: Object.entries(spec).filter(([, f]) => f.required).map(([name]) => name),
    additionalProperties: false,
  };
}
