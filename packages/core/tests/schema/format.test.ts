import { describe, it, expect } from 'vitest';
import { Schema, defineSchema } from '../../src/schema/descriptor';
import { formatSchema, isFormattingMode, FORMATTING_MODES } from '../../src/schema/format';
import { toJsonSchema } from '../../src/schema/json-schema';

const invoice = defineSchema(
  {
    number: Schema.string({ description: 'Invoice number', pattern: '^INV-\\d+$' }),
    total: Schema.number({ minimum: 0 }),
    paid: Schema.boolean({ required: false, default: false }),
    lines: Schema.list(
      Schema.object({
        sku: Schema.string(),
        qty: Schema.number({ integer: true, minimum: 1 }),
      }),
      { minItems: 1 }
    ),
    tags: Schema.list(Schema.string({ enum: ['urgent', 'export'] }), { required: false }),
  },
  { name: 'invoice', description: 'A billing document' }
);

describe('formatSchema', () => {
  it('should render one indented line per field', () => {
    expect(formatSchema(invoice, 'indented')).toBe(
      [
        'invoice (object): A billing document',
        '  - number (string, required, pattern /^INV-\\d+$/): Invoice number',
        '  - total (number, required, minimum 0)',
        '  - paid (boolean, optional, default false)',
        '  - lines (list of object, required, at least 1 items)',
        '    - sku (string, required)',
        '    - qty (integer, required, minimum 1)',
        '  - tags (list of string, optional, items one of "urgent" | "export")',
      ].join('\n')
    );
  });

  it('should use indented mode by default', () => {
    expect(formatSchema(invoice)).toBe(formatSchema(invoice, 'indented'));
  });

  it('should inline nested fields in compact mode', () => {
    expect(formatSchema(invoice, 'compact')).toBe(
      [
        'invoice (object)',
        '  - number (string, required, pattern /^INV-\\d+$/)',
        '  - total (number, required, minimum 0)',
        '  - paid (boolean, optional, default false)',
        '  - lines (list of object, required, at least 1 items) { sku (string, required); qty (integer, required, minimum 1) }',
        '  - tags (list of string, optional, items one of "urgent" | "export")',
      ].join('\n')
    );
  });

  it('should render the equivalent JSON Schema', () => {
    const text = formatSchema(invoice, 'json-schema');
    expect(JSON.parse(text)).toEqual(toJsonSchema(invoice));
    expect(text.startsWith('{\n  "type": "object",\n  "title": "invoice",')).toBe(true);
  });

  it('should name an unnamed schema "response"', () => {
    const schema = defineSchema({ ok: Schema.boolean() });
    expect(formatSchema(schema)).toBe('response (object)\n  - ok (boolean, required)');
  });

  it('should never collapse onto a single line', () => {
    const schema = defineSchema({ ok: Schema.boolean() });
    for (const mode of FORMATTING_MODES) {
      expect(formatSchema(schema, mode)).toContain('\n');
    }
  });

  it('should be deterministic', () => {
    for (const mode of FORMATTING_MODES) {
      expect(formatSchema(invoice, mode)).toBe(formatSchema(invoice, mode));
    }
  });

  it('should list numeric enums and maximums', () => {
    const schema = defineSchema({ rating: Schema.number({ enum: [1, 2, 3], maximum: 3 }) });
    expect(formatSchema(schema)).toBe('response (object)\n  - rating (number, required, one of 1 | 2 | 3, maximum 3)');
  });
});

describe('isFormattingMode', () => {
  it('should accept known modes only', () => {
    expect(isFormattingMode('compact')).toBe(true);
    expect(isFormattingMode('yaml')).toBe(false);
  });
});
