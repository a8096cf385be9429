import { describe, it, expect } from 'vitest';
import { AnthropicProvider } from '../../src/providers/anthropic';
import { SchemaGuidedExtractor } from '../../src/extractor/extractor';
import { Schema, defineSchema } from '../../src/schema/descriptor';
import { Logger } from '../../src/utils/logger';

describe('AnthropicProvider', () => {
  it('should complete a prompt', async () => {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      console.log('Skipping: ANTHROPIC_API_KEY not set');
      return;
    }

    const provider = new AnthropicProvider({ apiKey });
    const text = await provider.complete('Reply with the single word "pong" and nothing else.', {
      model: 'claude-3-5-haiku-latest',
      maxTokens: 16,
    });

    expect(text.toLowerCase()).toContain('pong');
  }, 30000);

  it('should extract a structured value', async () => {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      console.log('Skipping: ANTHROPIC_API_KEY not set');
      return;
    }

    const extractor = new SchemaGuidedExtractor(new AnthropicProvider({ apiKey }), {
      model: 'claude-3-5-haiku-latest',
      logger: new Logger('silent'),
    });
    const result = await extractor.extract({
      instructions: 'Extract the city and country from: "The meeting moved to Lyon, France."',
      schema: defineSchema({ city: Schema.string(), country: Schema.string() }),
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.city).toBe('Lyon');
    }
  }, 60000);
});
