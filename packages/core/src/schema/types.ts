/**
 * Schema descriptor type definitions
 *
 * A SchemaDescriptor declares the shape a model response must take:
 * a mapping of field name to a typed field spec with a required flag
 * and optional constraints.
 */

/** Type tags a field can carry */
export type FieldType = 'string' | 'number' | 'boolean' | 'list' | 'object';

interface BaseField {
  /** Whether the field must be present in every payload */
  readonly required: boolean;
  /** Short explanation shown to the model next to the field */
  readonly description?: string;
}

export interface StringField extends BaseField {
  readonly type: 'string';
  /** Allowed values */
  readonly enum?: readonly string[];
  readonly minLength?: number;
  readonly maxLength?: number;
  /** Regular expression source the value must match */
  readonly pattern?: string;
  /** Fallback applied when an optional field is absent */
  readonly default?: string;
}

export interface NumberField extends BaseField {
  readonly type: 'number';
  /** Reject values with a fractional part */
  readonly integer?: boolean;
  /** Inclusive lower bound */
  readonly minimum?: number;
  /** Inclusive upper bound */
  readonly maximum?: number;
  /** Allowed values */
  readonly enum?: readonly number[];
  /** Fallback applied when an optional field is absent */
  readonly default?: number;
}

export interface BooleanField extends BaseField {
  readonly type: 'boolean';
  /** Fallback applied when an optional field is absent */
  readonly default?: boolean;
}

export interface ListField extends BaseField {
  readonly type: 'list';
  /** Spec every item must satisfy (its required flag is ignored) */
  readonly items: FieldSpec;
  readonly minItems?: number;
  readonly maxItems?: number;
}

export interface ObjectField extends BaseField {
  readonly type: 'object';
  readonly fields: FieldMap;
}

export type FieldSpec = StringField | NumberField | BooleanField | ListField | ObjectField;

export type FieldMap = { readonly [name: string]: FieldSpec };

/** How keys that the schema does not declare are treated */
export type AdditionalFieldsPolicy = 'strip' | 'reject';

/** Immutable description of an expected output shape */
export interface SchemaDescriptor {
  readonly fields: FieldMap;
  readonly additionalFields: AdditionalFieldsPolicy;
  /** Optional name, used in transcripts and JSON Schema titles */
  readonly name?: string;
  readonly description?: string;
}

/** Options accepted by defineSchema */
export interface SchemaOptions {
  name?: string;
  description?: string;
  /** Default: 'strip' */
  additionalFields?: AdditionalFieldsPolicy;
}

/** A JSON value as produced by JSON.parse */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** A validated payload; only declared fields survive validation */
export type StructuredObject = JsonObject;

/** Check that a value is a plain JSON object (not an array or null) */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
