/**
 * Schema formatting for prompts
 *
 * Every mode renders across several lines; none collapses the schema
 * onto a single line.
 */

import { toJsonSchema } from './json-schema';
import type { FieldMap, FieldSpec, SchemaDescriptor } from './types';

/**
 * - indented: one line per field, nested fields indented beneath their parent
 * - compact: one line per top-level field, nested fields inlined in braces
 * - json-schema: the equivalent JSON Schema with two-space indentation
 */
export type FormattingMode = 'indented' | 'compact' | 'json-schema';

export const FORMATTING_MODES: readonly FormattingMode[] = ['indented', 'compact', 'json-schema'];

const INDENT = '  ';

export function isFormattingMode(value: string): value is FormattingMode {
  return FORMATTING_MODES.some((mode) => mode === value);
}

/** Render a descriptor for embedding in a prompt; output is deterministic */
export function formatSchema(descriptor: SchemaDescriptor, mode: FormattingMode = 'indented'): string {
  if (mode === 'json-schema') {
    return JSON.stringify(toJsonSchema(descriptor), null, 2);
  }

  const title = descriptor.name ?? 'response';
  const header = mode === 'indented' && descriptor.description
    ? `${title} (object): ${descriptor.description}`
    : `${title} (object)`;

  const body = mode === 'indented'
    ? indentedLines(descriptor.fields, 1)
    : Object.entries(descriptor.fields).map(([name, field]) => `${INDENT}- ${compactField(name, field)}`);

  return [header, ...body].join('\n');
}

function indentedLines(fields: FieldMap, depth: number): string[] {
  const lines: string[] = [];
  for (const [name, field] of Object.entries(fields)) {
    const description = field.description ? `: ${field.description}` : '';
    lines.push(`${INDENT.repeat(depth)}- ${fieldHead(name, field)}${description}`);

    const children = childFields(field);
    if (children) {
      lines.push(...indentedLines(children, depth + 1));
    }
  }
  return lines;
}

function compactField(name: string, field: FieldSpec): string {
  const children = childFields(field);
  if (!children) {
    return fieldHead(name, field);
  }
  const inner = Object.entries(children)
    .map(([childName, child]) => compactField(childName, child))
    .join('; ');
  return `${fieldHead(name, field)} { ${inner} }`;
}

function fieldHead(name: string, field: FieldSpec): string {
  const parts = [typeLabel(field), field.required ? 'required' : 'optional', ...constraints(field)];
  return `${name} (${parts.join(', ')})`;
}

function typeLabel(field: FieldSpec): string {
  switch (field.type) {
    case 'number':
      return field.integer ? 'integer' : 'number';
    case 'list':
      return `list of ${typeLabel(field.items)}`;
    default:
      return field.type;
  }
}

function constraints(field: FieldSpec): string[] {
  const out: string[] = [];
  switch (field.type) {
    case 'string':
      if (field.enum) out.push(`one of ${field.enum.map((v) => JSON.stringify(v)).join(' | ')}`);
      if (field.minLength !== undefined) out.push(`min length ${field.minLength}`);
      if (field.maxLength !== undefined) out.push(`max length ${field.maxLength}`);
      if (field.pattern !== undefined) out.push(`pattern /${field.pattern}/`);
      break;
    case 'number':
      if (field.enum) out.push(`one of ${field.enum.join(' | ')}`);
      if (field.minimum !== undefined) out.push(`minimum ${field.minimum}`);
      if (field.maximum !== undefined) out.push(`maximum ${field.maximum}`);
      break;
    case 'list':
      if (field.minItems !== undefined) out.push(`at least ${field.minItems} items`);
      if (field.maxItems !== undefined) out.push(`at most ${field.maxItems} items`);
      if (field.items.type !== 'object') {
        out.push(...constraints(field.items).map((c) => `items ${c}`));
      }
      break;
    default:
      break;
  }
  if ('default' in field && field.default !== undefined) {
    out.push(`default ${JSON.stringify(field.default)}`);
  }
  return out;
}

/** Nested fields shown beneath a field: an object's own, or a list's item object */
function childFields(field: FieldSpec): FieldMap | undefined {
  if (field.type === 'object') return field.fields;
  if (field.type === 'list') return childFields(field.items);
  return undefined;
}
