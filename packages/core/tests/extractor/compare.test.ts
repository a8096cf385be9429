import { describe, it, expect } from 'vitest';
import { compareFormattingModes } from '../../src/extractor/compare';
import { SchemaGuidedExtractor } from '../../src/extractor/extractor';
import { Schema, defineSchema } from '../../src/schema/descriptor';
import { formatSchema } from '../../src/schema/format';
import { Logger } from '../../src/utils/logger';
import type { TextGenerator } from '../../src/providers/base';

/** Answers each call with the next canned reply */
class QueuedBackend implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly replies: string[]) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.replies[this.prompts.length - 1] ?? '';
  }
}

const person = defineSchema({
  name: Schema.string(),
  age: Schema.number({ integer: true, minimum: 0 }),
});

function createExtractor(backend: TextGenerator): SchemaGuidedExtractor {
  return new SchemaGuidedExtractor(backend, { model: 'test-model', logger: new Logger('silent') });
}

describe('compareFormattingModes', () => {
  it('should run one extraction per mode and report each outcome', async () => {
    const backend = new QueuedBackend(['{"name": "Ana", "age": 3}', 'no idea', '{"name": "Ana", "age": 3}']);
    const comparisons = await compareFormattingModes(createExtractor(backend), {
      instructions: 'Extract the person.',
      schema: person,
      maxRetries: 0,
    });

    expect(comparisons).toEqual([
      { mode: 'indented', success: true, attempts: 1, value: { name: 'Ana', age: 3 } },
      { mode: 'compact', success: false, attempts: 1, reason: 'no JSON object found in response' },
      { mode: 'json-schema', success: true, attempts: 1, value: { name: 'Ana', age: 3 } },
    ]);
    expect(backend.prompts[0]).toContain(formatSchema(person, 'indented'));
    expect(backend.prompts[1]).toContain(formatSchema(person, 'compact'));
    expect(backend.prompts[2]).toContain(formatSchema(person, 'json-schema'));
  });

  it('should count corrective retries per mode', async () => {
    const backend = new QueuedBackend(['{"name": "Ana"}', '{"name": "Ana", "age": 3}']);
    const comparisons = await compareFormattingModes(
      createExtractor(backend),
      { instructions: 'Extract the person.', schema: person, maxRetries: 1 },
      ['compact']
    );

    expect(comparisons).toEqual([{ mode: 'compact', success: true, attempts: 2, value: { name: 'Ana', age: 3 } }]);
  });
});
