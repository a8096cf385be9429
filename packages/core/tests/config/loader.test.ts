import { describe, it, expect } from 'vitest';
import { loadExtractorConfig, createExtractor } from '../../src/config/loader';
import { SchemaGuidedExtractor } from '../../src/extractor/extractor';
import { Schema, defineSchema } from '../../src/schema/descriptor';
import { ConfigError } from '../../src/errors';
import { Logger } from '../../src/utils/logger';
import { extract } from '../../src';
import type { TextGenerator } from '../../src/providers/base';

const schema = defineSchema({ name: Schema.string() });

function fixedBackend(reply: string): TextGenerator & { calls: number } {
  return {
    calls: 0,
    async complete() {
      this.calls++;
      return reply;
    },
  };
}

describe('loadExtractorConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadExtractorConfig({})).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      temperature: 0.2,
      maxTokens: 4096,
      timeoutMs: 60000,
      maxRetries: 2,
      formattingMode: 'indented',
      logLevel: 'info',
    });
  });

  it('should read settings and the provider key from the environment', () => {
    const config = loadExtractorConfig({
      SX_MODEL: 'claude-3-5-haiku-latest',
      SX_TEMPERATURE: '0.5',
      SX_MAX_TOKENS: '1024',
      SX_TIMEOUT_MS: '5000',
      SX_MAX_RETRIES: '4',
      SX_FORMAT: 'compact',
      SX_LOG_LEVEL: 'debug',
      SX_BASE_URL: 'https://llm.example.test/v1',
      ANTHROPIC_API_KEY: 'test-secret',
      OPENAI_API_KEY: 'test-other',
    });

    expect(config).toEqual({
      provider: 'anthropic',
      model: 'claude-3-5-haiku-latest',
      apiKey: 'test-secret',
      baseURL: 'https://llm.example.test/v1',
      temperature: 0.5,
      maxTokens: 1024,
      timeoutMs: 5000,
      maxRetries: 4,
      formattingMode: 'compact',
      logLevel: 'debug',
    });
  });

  it('should let overrides win over the environment', () => {
    const config = loadExtractorConfig(
      { SX_MAX_RETRIES: '4', SX_MODEL: 'gpt-4o', OPENAI_API_KEY: 'test-secret' },
      { maxRetries: 0, model: 'gpt-4o-mini', apiKey: 'test-override' }
    );
    expect(config.maxRetries).toBe(0);
    expect(config.model).toBe('gpt-4o-mini');
    expect(config.apiKey).toBe('test-override');
  });

  it('should pick the default model of a named provider', () => {
    const config = loadExtractorConfig({ SX_PROVIDER: 'google', GEMINI_API_KEY: 'test-secret' });
    expect(config.provider).toBe('google');
    expect(config.model).toBe('gemini-2.0-flash');
    expect(config.apiKey).toBe('test-secret');
  });

  it('should fall back to an Anthropic auth token', () => {
    const config = loadExtractorConfig({ SX_PROVIDER: 'anthropic', ANTHROPIC_AUTH_TOKEN: 'test-token' });
    expect(config.authToken).toBe('test-token');
    expect(config.apiKey).toBeUndefined();
  });

  it('should ignore blank variables', () => {
    expect(loadExtractorConfig({ SX_MODEL: '   ', SX_MAX_RETRIES: '' }).model).toBe('gpt-4o-mini');
  });

  it('should reject malformed values', () => {
    expect(() => loadExtractorConfig({ SX_TEMPERATURE: 'hot' })).toThrow(ConfigError);
    expect(() => loadExtractorConfig({ SX_TEMPERATURE: 'hot' })).toThrow(/^Invalid configuration: temperature: /);
    expect(() => loadExtractorConfig({ SX_MAX_RETRIES: '-1' })).toThrow(/^Invalid configuration: maxRetries: /);
    expect(() => loadExtractorConfig({ SX_FORMAT: 'yaml' })).toThrow(/^Invalid configuration: formattingMode: /);
    expect(() => loadExtractorConfig({ SX_PROVIDER: 'mistral' })).toThrow(/^Invalid configuration: provider: /);
  });
});

describe('createExtractor', () => {
  it('should require an API key for the provider', () => {
    expect(() => createExtractor(loadExtractorConfig({}))).toThrow(
      'openai API key is required. Provide it via apiKey or the OPENAI_API_KEY environment variable.'
    );
  });

  it('should build a provider-backed extractor when a key is present', () => {
    const config = loadExtractorConfig({ OPENAI_API_KEY: 'test-secret' });
    expect(createExtractor(config)).toBeInstanceOf(SchemaGuidedExtractor);
  });

  it('should apply the retry count to an injected backend', async () => {
    const backend = fixedBackend('no json here');
    const config = loadExtractorConfig({}, { maxRetries: 1 });
    const extractor = createExtractor(config, { backend, logger: new Logger('silent') });

    const result = await extractor.extract({ instructions: 'Extract.', schema });

    expect(result).toMatchObject({ success: false, attempts: 2 });
    expect(backend.calls).toBe(2);
  });
});

describe('extract', () => {
  it('should reject with ConfigError when no key is available', async () => {
    await expect(extract('Extract.', schema, { env: {} })).rejects.toThrow(ConfigError);
  });
});
