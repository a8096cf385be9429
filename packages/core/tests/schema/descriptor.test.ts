import { describe, it, expect } from 'vitest';
import { Schema, defineSchema, assertSchemaDescriptor } from '../../src/schema/descriptor';
import { SchemaError } from '../../src/errors';
import type { FieldMap } from '../../src/schema/types';

describe('Schema builders', () => {
  it('should mark fields required by default', () => {
    expect(Schema.string()).toEqual({ type: 'string', required: true });
    expect(Schema.boolean({ required: false })).toEqual({ type: 'boolean', required: false });
  });

  it('should keep constraints alongside the type tag', () => {
    expect(Schema.number({ integer: true, minimum: 0 })).toEqual({
      type: 'number',
      integer: true,
      minimum: 0,
      required: true,
    });
  });

  it('should nest item and field specs', () => {
    const list = Schema.list(Schema.string(), { minItems: 1 });
    expect(list.items).toEqual({ type: 'string', required: true });
    expect(list.minItems).toBe(1);

    const address = Schema.object({ city: Schema.string() }, { required: false });
    expect(address.fields.city.type).toBe('string');
    expect(address.required).toBe(false);
  });
});

describe('defineSchema', () => {
  it('should default to stripping undeclared fields', () => {
    const schema = defineSchema({ name: Schema.string() });
    expect(schema.additionalFields).toBe('strip');
    expect(schema.name).toBeUndefined();
  });

  it('should carry name and description', () => {
    const schema = defineSchema(
      { name: Schema.string() },
      { name: 'person', description: 'A person', additionalFields: 'reject' }
    );
    expect(schema.name).toBe('person');
    expect(schema.description).toBe('A person');
    expect(schema.additionalFields).toBe('reject');
  });

  it('should return a deeply frozen copy', () => {
    const fields: Record<string, ReturnType<typeof Schema.string>> = { name: Schema.string() };
    const schema = defineSchema({
      ...fields,
      address: Schema.object({ city: Schema.string() }),
    });

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields.address)).toBe(true);

    fields.name = Schema.string({ required: false });
    expect(schema.fields.name.required).toBe(true);
  });

  it('should reject an empty field map', () => {
    expect(() => defineSchema({})).toThrow(SchemaError);
    expect(() => defineSchema({})).toThrow('schema must declare at least one field');
  });

  it('should reject an empty nested object', () => {
    expect(() => defineSchema({ address: Schema.object({}) })).toThrow(
      'address: object must declare at least one field'
    );
  });

  it('should reject inverted ranges', () => {
    expect(() => defineSchema({ code: Schema.string({ minLength: 5, maxLength: 2 }) })).toThrow(
      'code: minLength (5) is greater than maxLength (2)'
    );
    expect(() => defineSchema({ age: Schema.number({ minimum: 10, maximum: 1 }) })).toThrow(
      'age: minimum (10) is greater than maximum (1)'
    );
  });

  it('should reject negative counts on list items', () => {
    expect(() => defineSchema({ tags: Schema.list(Schema.string({ minLength: -1 })) })).toThrow(
      'tags[]: minLength must be a non-negative integer'
    );
  });

  it('should reject empty enums', () => {
    expect(() => defineSchema({ kind: Schema.string({ enum: [] }) })).toThrow(
      'kind: enum must list at least one value'
    );
  });

  it('should reject invalid patterns', () => {
    expect(() => defineSchema({ code: Schema.string({ pattern: '(' }) })).toThrow(/^code: invalid pattern \/\(\//);
  });

  it('should only allow defaults on optional fields', () => {
    expect(() => defineSchema({ status: Schema.string({ default: 'active' }) })).toThrow(
      'status: default is only allowed on optional fields'
    );
  });

  it('should require defaults to satisfy the field constraints', () => {
    expect(() =>
      defineSchema({ count: Schema.number({ required: false, minimum: 1, default: 0 }) })
    ).toThrow("count: default 0 does not satisfy the field's constraints");
  });

  it('should accept a valid default on an optional field', () => {
    const schema = defineSchema({
      status: Schema.string({ required: false, enum: ['active', 'inactive'], default: 'active' }),
    });
    expect(schema.fields.status).toEqual({
      type: 'string',
      required: false,
      enum: ['active', 'inactive'],
      default: 'active',
    });
  });
});

describe('assertSchemaDescriptor', () => {
  it('should check hand-built descriptors', () => {
    const fields: FieldMap = {};
    expect(() => assertSchemaDescriptor({ fields, additionalFields: 'strip' })).toThrow(
      'schema must declare at least one field'
    );
  });

  it('should accept a descriptor from defineSchema', () => {
    const schema = defineSchema({ name: Schema.string() });
    expect(() => assertSchemaDescriptor(schema)).not.toThrow();
  });
});
