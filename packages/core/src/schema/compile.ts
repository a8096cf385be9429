/**
 * Compiles schema descriptors into zod validators
 */

import { z } from 'zod';
import type { FieldMap, FieldSpec, AdditionalFieldsPolicy, SchemaDescriptor } from './types';

/** Marks custom issues raised for enumerated-value checks */
export const ENUM_CONSTRAINT = 'enum';

/**
 * Compile the value check for a field, ignoring its required flag
 * and default. Used for list items and for checking declared defaults.
 */
export function compileValue(field: FieldSpec, policy: AdditionalFieldsPolicy = 'strip'): z.ZodType<unknown> {
  switch (field.type) {
    case 'string': {
      let schema = z.string();
      if (field.minLength !== undefined) schema = schema.min(field.minLength);
      if (field.maxLength !== undefined) schema = schema.max(field.maxLength);
      if (field.pattern !== undefined) {
        schema = schema.regex(new RegExp(field.pattern), {
          message: `must match pattern /${field.pattern}/`,
        });
      }
      return withEnum(schema, field.enum);
    }
    case 'number': {
      let schema = z.number().finite();
      if (field.integer) schema = schema.int();
      if (field.minimum !== undefined) schema = schema.gte(field.minimum);
      if (field.maximum !== undefined) schema = schema.lte(field.maximum);
      return withEnum(schema, field.enum);
    }
    case 'boolean':
      return z.boolean();
    case 'list': {
      let schema = z.array(compileValue(field.items, policy));
      if (field.minItems !== undefined) schema = schema.min(field.minItems);
      if (field.maxItems !== undefined) schema = schema.max(field.maxItems);
      return schema;
    }
    case 'object':
      return compileObject(field.fields, policy);
  }
}

/**
 * Compile a field as it appears inside an object: optional fields
 * treat null as absent and fall back to their default.
 */
export function compileField(field: FieldSpec, policy: AdditionalFieldsPolicy = 'strip'): z.ZodType<unknown> {
  const value = compileValue(field, policy);
  if (field.required) {
    return value;
  }

  const fallback = 'default' in field ? field.default : undefined;
  const optional = fallback !== undefined ? value.default(fallback) : value.optional();
  return z.preprocess((input) => (input === null ? undefined : input), optional);
}

export function compileObject(fields: FieldMap, policy: AdditionalFieldsPolicy): z.ZodType<unknown> {
  const shape: Record<string, z.ZodType<unknown>> = {};
  for (const [name, field] of Object.entries(fields)) {
    shape[name] = compileField(field, policy);
  }
  const object = z.object(shape);
  return policy === 'reject' ? object.strict() : object.strip();
}

/** Compile a whole descriptor into a validator for the payload root */
export function compileSchema(descriptor: SchemaDescriptor): z.ZodType<unknown> {
  return compileObject(descriptor.fields, descriptor.additionalFields);
}

function withEnum<T extends string | number>(
  schema: z.ZodType<T>,
  allowed: readonly T[] | undefined
): z.ZodType<unknown> {
  if (!allowed) {
    return schema;
  }
  return schema.superRefine((value, ctx) => {
    if (!allowed.includes(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `value ${JSON.stringify(value)} is not one of ${allowed.map((v) => JSON.stringify(v)).join(', ')}`,
        params: { constraint: ENUM_CONSTRAINT },
      });
    }
  });
}
