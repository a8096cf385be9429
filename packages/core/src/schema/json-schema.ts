/**
 * Conversion between schema descriptors and JSON Schema documents
 */

import { z } from 'zod';
import { SchemaError } from '../errors';
import { logger as sharedLogger, type Logger } from '../utils/logger';
import { defineSchema } from './descriptor';
import type {
  AdditionalFieldsPolicy,
  FieldMap,
  FieldSpec,
  JsonObject,
  JsonValue,
  SchemaDescriptor,
} from './types';

/** The subset of JSON Schema understood by fromJsonSchema */
export interface JsonSchemaNode {
  type?: string | string[];
  title?: string;
  description?: string;
  properties?: Record<string, JsonSchemaNode>;
  required?: string[];
  additionalProperties?: boolean | JsonSchemaNode;
  items?: JsonSchemaNode;
  enum?: Array<string | number | boolean | null>;
  anyOf?: JsonSchemaNode[];
  oneOf?: JsonSchemaNode[];
  allOf?: JsonSchemaNode[];
  $ref?: string;
  $defs?: Record<string, JsonSchemaNode>;
  definitions?: Record<string, JsonSchemaNode>;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
  default?: unknown;
}

const jsonSchemaNode: z.ZodType<JsonSchemaNode> = z.lazy(() =>
  z.object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    properties: z.record(jsonSchemaNode).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.union([z.boolean(), jsonSchemaNode]).optional(),
    items: jsonSchemaNode.optional(),
    enum: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    anyOf: z.array(jsonSchemaNode).optional(),
    oneOf: z.array(jsonSchemaNode).optional(),
    allOf: z.array(jsonSchemaNode).optional(),
    $ref: z.string().optional(),
    $defs: z.record(jsonSchemaNode).optional(),
    definitions: z.record(jsonSchemaNode).optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    minLength: z.number().optional(),
    maxLength: z.number().optional(),
    pattern: z.string().optional(),
    minItems: z.number().optional(),
    maxItems: z.number().optional(),
    default: z.unknown().optional(),
  })
);

const REF_PREFIXES = ['#/$defs/', '#/definitions/'];
const SCALAR_TYPES = ['string', 'number', 'integer', 'boolean'];

/**
 * Describe a schema descriptor as a JSON Schema object
 * Keys are emitted in a fixed order so serialization is stable.
 */
export function toJsonSchema(descriptor: SchemaDescriptor): JsonObject {
  const schema: JsonObject = { type: 'object' };
  if (descriptor.name !== undefined) schema.title = descriptor.name;
  if (descriptor.description !== undefined) schema.description = descriptor.description;
  Object.assign(schema, objectBody(descriptor.fields, descriptor.additionalFields));
  return schema;
}

function objectBody(fields: FieldMap, policy: AdditionalFieldsPolicy): JsonObject {
  const properties: JsonObject = {};
  const required: string[] = [];
  for (const [name, field] of Object.entries(fields)) {
    properties[name] = fieldToJsonSchema(field, policy);
    if (field.required) required.push(name);
  }

  const body: JsonObject = { properties };
  if (required.length > 0) body.required = required;
  if (policy === 'reject') body.additionalProperties = false;
  return body;
}

function fieldToJsonSchema(field: FieldSpec, policy: AdditionalFieldsPolicy): JsonObject {
  const out: JsonObject = {};
  const set = (key: string, value: JsonValue | undefined): void => {
    if (value !== undefined) out[key] = value;
  };

  switch (field.type) {
    case 'string':
      set('type', 'string');
      set('description', field.description);
      set('enum', field.enum ? [...field.enum] : undefined);
      set('minLength', field.minLength);
      set('maxLength', field.maxLength);
      set('pattern', field.pattern);
      set('default', field.default);
      break;
    case 'number':
      set('type', field.integer ? 'integer' : 'number');
      set('description', field.description);
      set('enum', field.enum ? [...field.enum] : undefined);
      set('minimum', field.minimum);
      set('maximum', field.maximum);
      set('default', field.default);
      break;
    case 'boolean':
      set('type', 'boolean');
      set('description', field.description);
      set('default', field.default);
      break;
    case 'list':
      set('type', 'array');
      set('description', field.description);
      set('items', fieldToJsonSchema(field.items, policy));
      set('minItems', field.minItems);
      set('maxItems', field.maxItems);
      break;
    case 'object':
      set('type', 'object');
      set('description', field.description);
      Object.assign(out, objectBody(field.fields, policy));
      break;
  }
  return out;
}

/**
 * Build a schema descriptor from a JSON Schema document
 *
 * Nullable fields (`type: [T, "null"]`, an anyOf with a null branch or
 * an enum listing null) and scalars with a default become optional.
 * Local `$ref`s into `$defs`/`definitions` are followed; recursive
 * references are rejected.
 *
 * Objects without declared properties (free-form maps) cannot be
 * described field by field: optional ones are dropped with a warning,
 * required ones are an error.
 *
 * @throws SchemaError for malformed or unsupported documents
 */
export function fromJsonSchema(
  document: unknown,
  options: { name?: string; logger?: Logger } = {}
): SchemaDescriptor {
  const parsed = jsonSchemaNode.safeParse(document);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(`invalid JSON Schema: ${problems}`);
  }

  const root = parsed.data;
  const context: ConversionContext = {
    definitions: { ...root.definitions, ...root.$defs },
    logger: options.logger ?? sharedLogger,
  };
  const { node } = resolve(root, context, [], '(root)');
  if (nodeType(node, '(root)') !== 'object' || !node.properties) {
    throw new SchemaError('(root): JSON Schema root must be an object with properties');
  }

  const name = options.name ?? root.title;
  return defineSchema(convertProperties(node, context, [], ''), {
    ...(name !== undefined ? { name } : {}),
    ...(root.description !== undefined ? { description: root.description } : {}),
    additionalFields: node.additionalProperties === false ? 'reject' : 'strip',
  });
}

interface ConversionContext {
  definitions: Record<string, JsonSchemaNode>;
  logger: Logger;
}

function convertProperties(
  node: JsonSchemaNode,
  context: ConversionContext,
  refs: string[],
  path: string
): FieldMap {
  const required = new Set(node.required ?? []);
  const fields: Record<string, FieldSpec> = {};
  for (const [name, property] of Object.entries(node.properties ?? {})) {
    const fieldPath = path === '' ? name : `${path}.${name}`;
    if (isOptionalFreeFormObject(property, context, refs, required.has(name), fieldPath)) {
      context.logger.warn(`${fieldPath}: dropped optional object without declared properties`);
      continue;
    }
    fields[name] = convertNode(property, context, refs, required.has(name), fieldPath);
  }
  return fields;
}

function convertNode(
  raw: JsonSchemaNode,
  context: ConversionContext,
  refs: string[],
  required: boolean,
  path: string
): FieldSpec {
  const { node, refs: seen, nullable } = resolve(raw, context, refs, path);
  const type = nodeType(node, path);
  // a scalar with a default may be left out of the payload
  const hasDefault = SCALAR_TYPES.includes(type) && node.default !== undefined && node.default !== null;
  const description = node.description;
  const base = {
    required: required && !nullable && !hasDefault,
    ...(description !== undefined ? { description } : {}),
  };

  switch (type) {
    case 'string': {
      const fallback = defaultOf(node, 'string', path);
      return {
        ...base,
        type: 'string',
        ...(node.enum ? { enum: enumOf(node.enum, 'string', path) } : {}),
        ...(node.minLength !== undefined ? { minLength: node.minLength } : {}),
        ...(node.maxLength !== undefined ? { maxLength: node.maxLength } : {}),
        ...(node.pattern !== undefined ? { pattern: node.pattern } : {}),
        ...(typeof fallback === 'string' ? { default: fallback } : {}),
      };
    }
    case 'number':
    case 'integer': {
      const fallback = defaultOf(node, 'number', path);
      return {
        ...base,
        type: 'number',
        ...(type === 'integer' ? { integer: true } : {}),
        ...(node.enum ? { enum: enumOf(node.enum, 'number', path) } : {}),
        ...(node.minimum !== undefined ? { minimum: node.minimum } : {}),
        ...(node.maximum !== undefined ? { maximum: node.maximum } : {}),
        ...(typeof fallback === 'number' ? { default: fallback } : {}),
      };
    }
    case 'boolean': {
      const fallback = defaultOf(node, 'boolean', path);
      return {
        ...base,
        type: 'boolean',
        ...(typeof fallback === 'boolean' ? { default: fallback } : {}),
      };
    }
    case 'array':
      if (!node.items) {
        throw new SchemaError(`${path}: array must declare items`);
      }
      return {
        ...base,
        type: 'list',
        items: convertNode(node.items, context, seen, true, `${path}[]`),
        ...(node.minItems !== undefined ? { minItems: node.minItems } : {}),
        ...(node.maxItems !== undefined ? { maxItems: node.maxItems } : {}),
      };
    case 'object':
      if (!node.properties || Object.keys(node.properties).length === 0) {
        throw new SchemaError(`${path}: objects without declared properties are not supported`);
      }
      return {
        ...base,
        type: 'object',
        fields: convertProperties(node, context, seen, path),
      };
    default:
      throw new SchemaError(`${path}: unsupported type "${type}"`);
  }
}

function isOptionalFreeFormObject(
  raw: JsonSchemaNode,
  context: ConversionContext,
  refs: string[],
  required: boolean,
  path: string
): boolean {
  const { node, nullable } = resolve(raw, context, refs, path);
  if (node.properties && Object.keys(node.properties).length > 0) return false;
  const freeForm = node.type === 'object' || (node.type === undefined && node.additionalProperties !== undefined);
  return freeForm && (!required || nullable);
}

interface Resolved {
  node: JsonSchemaNode;
  refs: string[];
  nullable: boolean;
}

/** Follow $refs and unwrap nullable unions until a concrete node remains */
function resolve(node: JsonSchemaNode, context: ConversionContext, refs: string[], path: string): Resolved {
  if (node.$ref !== undefined) {
    const ref = node.$ref;
    if (refs.includes(ref)) {
      throw new SchemaError(`${path}: recursive reference ${ref} is not supported`);
    }
    const target = lookupRef(ref, context, path);
    const merged: JsonSchemaNode = {
      ...target,
      ...(node.description !== undefined ? { description: node.description } : {}),
      ...(node.default !== undefined ? { default: node.default } : {}),
    };
    return resolve(merged, context, [...refs, ref], path);
  }

  const union = node.anyOf ?? node.oneOf ?? (node.allOf?.length === 1 ? node.allOf : undefined);
  if (union) {
    const branches = union.filter((branch) => branch.type !== 'null');
    if (branches.length !== 1) {
      throw new SchemaError(`${path}: unions of several types are not supported`);
    }
    const merged: JsonSchemaNode = {
      ...branches[0],
      ...(node.description !== undefined ? { description: node.description } : {}),
      ...(node.default !== undefined ? { default: node.default } : {}),
    };
    const inner = resolve(merged, context, refs, path);
    return { ...inner, nullable: inner.nullable || branches.length !== union.length };
  }

  if (Array.isArray(node.type)) {
    const types = node.type.filter((t) => t !== 'null');
    if (types.length !== 1) {
      throw new SchemaError(`${path}: unions of several types are not supported`);
    }
    return {
      node: { ...node, type: types[0] },
      refs,
      nullable: types.length !== node.type.length || listsNull(node),
    };
  }

  return { node, refs, nullable: listsNull(node) };
}

function listsNull(node: JsonSchemaNode): boolean {
  return node.enum?.includes(null) ?? false;
}

function lookupRef(ref: string, context: ConversionContext, path: string): JsonSchemaNode {
  const prefix = REF_PREFIXES.find((p) => ref.startsWith(p));
  const target = prefix ? context.definitions[ref.slice(prefix.length)] : undefined;
  if (!target) {
    throw new SchemaError(`${path}: cannot resolve reference ${ref}`);
  }
  return target;
}

function nodeType(node: JsonSchemaNode, path: string): string {
  if (typeof node.type === 'string') return node.type;
  if (node.properties) return 'object';
  if (node.items) return 'array';
  if (node.enum && node.enum.length > 0) {
    const kinds = new Set(node.enum.filter((v) => v !== null).map((v) => typeof v));
    if (kinds.size === 1) {
      const [kind] = kinds;
      return kind;
    }
  }
  throw new SchemaError(`${path}: cannot determine field type`);
}

function enumOf(values: Array<string | number | boolean | null>, type: 'string', path: string): string[];
function enumOf(values: Array<string | number | boolean | null>, type: 'number', path: string): number[];
function enumOf(
  values: Array<string | number | boolean | null>,
  type: 'string' | 'number',
  path: string
): Array<string | number> {
  const out: Array<string | number> = [];
  for (const value of values) {
    if (value === null) continue;
    if (typeof value !== type || typeof value === 'boolean') {
      throw new SchemaError(`${path}: enum value ${JSON.stringify(value)} is not a ${type}`);
    }
    out.push(value);
  }
  return out;
}

/** A declared default, ignoring null; a default of the wrong type is an error */
function defaultOf(node: JsonSchemaNode, type: 'string' | 'number' | 'boolean', path: string): unknown {
  if (node.default === undefined || node.default === null) return undefined;
  if (typeof node.default !== type) {
    throw new SchemaError(`${path}: default ${JSON.stringify(node.default)} is not a ${type}`);
  }
  return node.default;
}
