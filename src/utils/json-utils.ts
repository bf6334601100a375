/**
 * Structured data parsing utilities
 * Centralized JSON/YAML parsing with validation and error handling
 *
 * Security: Prototype Pollution Prevention
 * - Sanitizes dangerous keys (__proto__, constructor, prototype)
 * - Validates structure before use
 */

import yaml from 'js-yaml';
import { z } from 'zod';

/**
 * Keys that can cause prototype pollution; never kept in parsed data
 */
const DANGEROUS_KEYS: readonly string[] = ['__proto__', 'constructor', 'prototype'];

/** Any schema producing T, whatever it accepts as input */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Recursively drop dangerous keys from parsed data
 */
export function sanitizeObject(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeObject(item));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (DANGEROUS_KEYS.includes(key)) {
      continue;
    }
    sanitized[key] = sanitizeObject(item);
  }
  return sanitized;
}

function validate<T>(data: unknown, schema: Schema<T>): ParseResult<T> {
  const result = schema.safeParse(sanitizeObject(data));
  if (!result.success) {
    return {
      success: false,
      error: `Validation failed: ${result.error.message}`,
    };
  }
  return { success: true, data: result.data };
}

/**
 * Parse JSON string with Zod schema validation
 */
export function parseJson<T>(jsonString: string, schema: Schema<T>): ParseResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(jsonString);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    };
  }
  return validate(data, schema);
}

/**
 * Parse YAML string with Zod schema validation.
 * An empty document parses as `emptyValue` when one is given.
 */
export function parseYaml<T>(yamlString: string, schema: Schema<T>, emptyValue?: T): ParseResult<T> {
  let data: unknown;
  try {
    data = yaml.load(yamlString);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Invalid YAML',
    };
  }

  if ((data === undefined || data === null) && emptyValue !== undefined) {
    return { success: true, data: emptyValue };
  }
  return validate(data, schema);
}
