/**
 * Schema descriptor construction
 *
 * Builders produce field specs; defineSchema checks the whole map,
 * fails fast with SchemaError on anything malformed, and returns a
 * deeply frozen descriptor.
 */

import { SchemaError } from '../errors';
import { compileValue } from './compile';
import type {
  BooleanField,
  FieldMap,
  FieldSpec,
  ListField,
  NumberField,
  ObjectField,
  SchemaDescriptor,
  SchemaOptions,
  StringField,
} from './types';

type BuilderOptions<F extends FieldSpec, Positional extends string = never> =
  Omit<F, 'type' | 'required' | Positional> & {
    /** Default: true */
    required?: boolean;
  };

export type StringOptions = BuilderOptions<StringField>;
export type NumberOptions = BuilderOptions<NumberField>;
export type BooleanOptions = BuilderOptions<BooleanField>;
export type ListOptions = BuilderOptions<ListField, 'items'>;
export type ObjectOptions = BuilderOptions<ObjectField, 'fields'>;

/**
 * Field spec builders
 *
 * @example
 * ```typescript
 * const person = defineSchema({
 *   name: Schema.string({ description: 'Full name' }),
 *   age: Schema.number({ integer: true, minimum: 0, maximum: 150 }),
 *   email: Schema.string({ required: false }),
 * });
 * ```
 */
export const Schema = {
  string(options: StringOptions = {}): StringField {
    return { ...options, type: 'string', required: options.required ?? true };
  },

  number(options: NumberOptions = {}): NumberField {
    return { ...options, type: 'number', required: options.required ?? true };
  },

  boolean(options: BooleanOptions = {}): BooleanField {
    return { ...options, type: 'boolean', required: options.required ?? true };
  },

  list(items: FieldSpec, options: ListOptions = {}): ListField {
    return { ...options, type: 'list', items, required: options.required ?? true };
  },

  object(fields: FieldMap, options: ObjectOptions = {}): ObjectField {
    return { ...options, type: 'object', fields, required: options.required ?? true };
  },
};

/**
 * Build an immutable schema descriptor
 * @throws SchemaError when the field map is empty or malformed
 */
export function defineSchema(fields: FieldMap, options: SchemaOptions = {}): SchemaDescriptor {
  const descriptor: SchemaDescriptor = {
    fields: structuredClone(fields),
    additionalFields: options.additionalFields ?? 'strip',
    ...(options.name !== undefined ? { name: options.name } : {}),
    ...(options.description !== undefined ? { description: options.description } : {}),
  };
  assertSchemaDescriptor(descriptor);
  return deepFreeze(descriptor);
}

/**
 * Check a descriptor that may have been assembled by hand
 * @throws SchemaError describing the first problem found
 */
export function assertSchemaDescriptor(descriptor: SchemaDescriptor): void {
  if (!isRecord(descriptor) || !isRecord(descriptor.fields)) {
    throw new SchemaError('schema must declare a fields map');
  }
  if (descriptor.additionalFields !== 'strip' && descriptor.additionalFields !== 'reject') {
    throw new SchemaError(`schema: additionalFields must be 'strip' or 'reject'`);
  }
  assertFieldMap(descriptor.fields, '');
}

function assertFieldMap(fields: FieldMap, path: string): void {
  const names = Object.keys(fields);
  if (names.length === 0) {
    throw new SchemaError(path === '' ? 'schema must declare at least one field' : `${path}: object must declare at least one field`);
  }
  for (const name of names) {
    if (name.trim() === '') {
      throw new SchemaError(`${path === '' ? 'schema' : path}: field names must not be empty`);
    }
    assertField(fields[name], path === '' ? name : `${path}.${name}`);
  }
}

function assertField(field: FieldSpec, path: string): void {
  if (!isRecord(field)) {
    throw new SchemaError(`${path}: field spec must be an object`);
  }
  if (typeof field.required !== 'boolean') {
    throw new SchemaError(`${path}: required flag must be a boolean`);
  }

  switch (field.type) {
    case 'string':
      assertRange(field.minLength, field.maxLength, path, 'minLength', 'maxLength', true);
      assertEnum(field.enum, 'string', path);
      if (field.pattern !== undefined) {
        assertPattern(field.pattern, path);
      }
      break;
    case 'number':
      assertRange(field.minimum, field.maximum, path, 'minimum', 'maximum', false);
      assertEnum(field.enum, 'number', path);
      break;
    case 'boolean':
      break;
    case 'list':
      assertRange(field.minItems, field.maxItems, path, 'minItems', 'maxItems', true);
      if (!isRecord(field.items)) {
        throw new SchemaError(`${path}: list must declare an items spec`);
      }
      assertField(field.items, `${path}[]`);
      break;
    case 'object':
      if (!isRecord(field.fields)) {
        throw new SchemaError(`${path}: object must declare a fields map`);
      }
      assertFieldMap(field.fields, path);
      break;
    default: {
      const unknownField: unknown = field;
      const tag = isRecord(unknownField) ? JSON.stringify(unknownField.type) : typeof unknownField;
      throw new SchemaError(`${path}: unknown field type ${tag}`);
    }
  }

  if ('default' in field && field.default !== undefined) {
    if (field.required) {
      throw new SchemaError(`${path}: default is only allowed on optional fields`);
    }
    if (!compileValue(field).safeParse(field.default).success) {
      throw new SchemaError(`${path}: default ${JSON.stringify(field.default)} does not satisfy the field's constraints`);
    }
  }
}

function assertRange(
  min: number | undefined,
  max: number | undefined,
  path: string,
  minName: string,
  maxName: string,
  isCount: boolean
): void {
  for (const [name, bound] of [[minName, min], [maxName, max]] as const) {
    if (bound === undefined) continue;
    if (typeof bound !== 'number' || !Number.isFinite(bound)) {
      throw new SchemaError(`${path}: ${name} must be a finite number`);
    }
    if (isCount && (bound < 0 || !Number.isInteger(bound))) {
      throw new SchemaError(`${path}: ${name} must be a non-negative integer`);
    }
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw new SchemaError(`${path}: ${minName} (${min}) is greater than ${maxName} (${max})`);
  }
}

function assertEnum(values: readonly unknown[] | undefined, type: 'string' | 'number', path: string): void {
  if (values === undefined) return;
  if (!Array.isArray(values) || values.length === 0) {
    throw new SchemaError(`${path}: enum must list at least one value`);
  }
  for (const value of values) {
    if (typeof value !== type || (type === 'number' && !Number.isFinite(value))) {
      throw new SchemaError(`${path}: enum value ${JSON.stringify(value)} is not a ${type}`);
    }
  }
}

function assertPattern(pattern: string, path: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`${path}: invalid pattern /${pattern}/ (${reason})`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
