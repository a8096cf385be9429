/**
 * Demo: Schema formatting modes
 *
 * Prints the request prompt for one schema in every formatting mode, so it
 * can be pasted into any chat model by hand. No API key needed.
 */

import { buildExtractionPrompt, defineSchema, formatSchema, FORMATTING_MODES, Schema } from '../packages/core/src';

const order = defineSchema(
  {
    order_id: Schema.string({ pattern: '^ORD-\\d+$', description: 'Order reference' }),
    customer: Schema.object({
      name: Schema.string(),
      email: Schema.string({ required: false }),
    }),
    items: Schema.list(
      Schema.object({
        sku: Schema.string(),
        quantity: Schema.number({ integer: true, minimum: 1 }),
      }),
      { minItems: 1 }
    ),
    gift: Schema.boolean({ required: false, default: false }),
  },
  { name: 'order', description: 'A customer order' }
);

for (const mode of FORMATTING_MODES) {
  console.log(`=== ${mode} ===\n`);
  console.log(
    buildExtractionPrompt({
      instructions: 'Extract the order from the email below.',
      schemaText: formatSchema(order, mode),
    })
  );
  console.log();
}
