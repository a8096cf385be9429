/**
 * Demo: Structured extraction with corrective retries
 *
 * Extracts a company record from free text. Set OPENAI_API_KEY (or
 * SX_MODEL plus the matching provider key) before running.
 */

import { extract, defineSchema, Schema, toTranscript } from '../packages/core/src';

const company = defineSchema(
  {
    company_name: Schema.string({ description: 'The company name' }),
    founded_year: Schema.number({ integer: true, minimum: 1800, description: 'Year the company was founded' }),
    founders: Schema.list(Schema.string(), { minItems: 1, description: 'Names of the founders' }),
    industry: Schema.string({
      required: false,
      enum: ['software', 'hardware', 'retail', 'other'],
      default: 'other',
    }),
  },
  { name: 'company_info', description: 'Information about a company' }
);

async function structuredOutputDemo() {
  console.log('=== Structured extraction ===\n');

  const result = await extract(
    'Extract the key information from: "Northwind Traders was started in 1994 by Jo Park and Sam Lee to sell hardware."',
    company,
    { model: process.env.SX_MODEL ?? 'gpt-4o-mini', maxRetries: 2 }
  );

  if (result.success) {
    console.log(`Extracted after ${result.attempts} attempt(s):`);
    console.log(JSON.stringify(result.value, null, 2));
  } else {
    console.log(`Extraction failed: ${result.reason}`);
  }

  console.log('\n=== Transcript ===\n');
  console.log(JSON.stringify(toTranscript(result, { model: 'demo', schemaName: company.name }), null, 2));
}

structuredOutputDemo().catch(console.error);
