export { Schema, defineSchema, assertSchemaDescriptor } from './descriptor';
export type { StringOptions, NumberOptions, BooleanOptions, ListOptions, ObjectOptions } from './descriptor';
export { formatSchema, isFormattingMode, FORMATTING_MODES, type FormattingMode } from './format';
export { toJsonSchema, fromJsonSchema, type JsonSchemaNode } from './json-schema';
export { validatePayload, formatPath } from './validate';
export { compileSchema } from './compile';
export { isJsonObject } from './types';
export type {
  FieldType,
  StringField,
  NumberField,
  BooleanField,
  ListField,
  ObjectField,
  FieldSpec,
  FieldMap,
  AdditionalFieldsPolicy,
  SchemaDescriptor,
  SchemaOptions,
  JsonValue,
  JsonObject,
  StructuredObject,
} from './types';
