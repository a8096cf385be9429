import { describe, it, expect } from 'vitest';
import { APICallError, type LanguageModel } from 'ai';
import { MockLanguageModelV2 } from 'ai/test';
import { LLMProvider } from '../../src/providers/base';
import { BackendError } from '../../src/errors';

class MockProvider extends LLMProvider {
  readonly name = 'mock';

  constructor(private readonly model: MockLanguageModelV2) {
    super({ apiKey: 'test-secret' });
  }

  protected languageModel(): LanguageModel {
    return this.model;
  }
}

function replyWith(text: string): MockLanguageModelV2 {
  return new MockLanguageModelV2({
    doGenerate: async () => ({
      content: [{ type: 'text', text }],
      finishReason: 'stop',
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      warnings: [],
    }),
  });
}

describe('LLMProvider.complete', () => {
  it('should return the generated text and forward the call settings', async () => {
    const model = replyWith('{"name": "Ana"}');
    const controller = new AbortController();

    const text = await new MockProvider(model).complete('Extract.', {
      model: 'mock-model',
      temperature: 0.3,
      maxTokens: 128,
      signal: controller.signal,
    });

    expect(text).toBe('{"name": "Ana"}');
    expect(model.doGenerateCalls).toHaveLength(1);
    expect(model.doGenerateCalls[0]).toMatchObject({
      temperature: 0.3,
      maxOutputTokens: 128,
      prompt: [{ role: 'user', content: [{ type: 'text', text: 'Extract.' }] }],
    });
    expect(model.doGenerateCalls[0].abortSignal).toBe(controller.signal);
  });

  it('should map a rate-limited call to a quota failure without retrying', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => {
        throw new APICallError({
          message: 'Too Many Requests',
          url: 'https://api.example.test/v1/chat',
          requestBodyValues: {},
          statusCode: 429,
        });
      },
    });

    const error = await new MockProvider(model).complete('Extract.', { model: 'mock-model' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({
      kind: 'quota',
      statusCode: 429,
      message: 'backend request failed: Too Many Requests',
    });
    expect(model.doGenerateCalls).toHaveLength(1);
  });

  it('should surface the abort reason when the signal fires mid-call', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: ({ abortSignal }) =>
        new Promise<never>((_, reject) => {
          const fail = (): void => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            reject(abortError);
          };
          if (abortSignal?.aborted) {
            fail();
            return;
          }
          abortSignal?.addEventListener('abort', fail, { once: true });
        }),
    });
    const controller = new AbortController();
    const timeout = new BackendError('backend timeout', 'timeout');

    const pending = new MockProvider(model).complete('Extract.', { model: 'mock-model', signal: controller.signal });
    controller.abort(timeout);

    await expect(pending).rejects.toBe(timeout);
  });
});
