/**
 * Payload validation against a schema descriptor
 */

import type { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors';
import { compileSchema, ENUM_CONSTRAINT } from './compile';
import { isJsonObject, type JsonValue, type SchemaDescriptor, type StructuredObject } from './types';

/**
 * Validate a parsed payload field by field.
 *
 * Optional fields that are absent (or null) take their declared default.
 * Undeclared keys are dropped, or rejected when the descriptor says so.
 *
 * @throws ValidationError listing every violated constraint
 */
export function validatePayload(descriptor: SchemaDescriptor, payload: unknown): StructuredObject {
  const result = compileSchema(descriptor).safeParse(payload);
  if (!result.success) {
    throw new ValidationError(result.error.issues.flatMap(toValidationIssues));
  }

  const value = toJsonValue(result.data);
  if (!isJsonObject(value)) {
    throw new ValidationError([{ path: '', code: 'type', message: '(root): expected object' }]);
  }
  return value;
}

/** Render a zod path as `contacts[0].email` */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc === '' ? segment : `${acc}.${segment}`;
  }, '');
}

function toValidationIssues(issue: z.ZodIssue): ValidationIssue[] {
  const path = formatPath(issue.path);
  const label = path === '' ? '(root)' : path;

  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return [{ path, code: 'missing', message: `${label}: required field is missing` }];
      }
      return [{
        path,
        code: 'type',
        message: `${label}: expected ${typeName(issue.expected)}, received ${typeName(issue.received)}`,
      }];

    case 'too_small':
    case 'too_big': {
      const bound = String(issue.code === 'too_small' ? issue.minimum : issue.maximum);
      const lower = issue.code === 'too_small';
      if (issue.type === 'string') {
        return [{
          path,
          code: 'length',
          message: `${label}: must be ${lower ? 'at least' : 'at most'} ${bound} characters long`,
        }];
      }
      if (issue.type === 'array') {
        return [{
          path,
          code: 'items',
          message: `${label}: must contain ${lower ? 'at least' : 'at most'} ${bound} items`,
        }];
      }
      const operator = lower ? (issue.inclusive ? '>=' : '>') : (issue.inclusive ? '<=' : '<');
      return [{ path, code: 'range', message: `${label}: must be ${operator} ${bound}` }];
    }

    case 'not_finite':
      return [{ path, code: 'range', message: `${label}: must be a finite number` }];

    case 'invalid_string':
      return [{ path, code: 'pattern', message: `${label}: ${issue.message}` }];

    case 'unrecognized_keys':
      return issue.keys.map((key) => {
        const keyPath = path === '' ? key : `${path}.${key}`;
        return {
          path: keyPath,
          code: 'unknown_field' as const,
          message: `${keyPath}: field is not declared in the schema`,
        };
      });

    case 'custom':
      if (issue.params?.constraint === ENUM_CONSTRAINT) {
        return [{ path, code: 'enum', message: `${label}: ${issue.message}` }];
      }
      return [{ path, code: 'type', message: `${label}: ${issue.message}` }];

    default:
      return [{ path, code: 'type', message: `${label}: ${issue.message}` }];
  }
}

function typeName(zodType: string): string {
  return zodType === 'array' ? 'list' : zodType;
}

/** Rebuild a zod result as plain JSON, dropping keys left undefined */
function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const object: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) object[key] = converted;
    }
    return object;
  }
  return undefined;
}
