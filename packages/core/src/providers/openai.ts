import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import { LLMProvider, type ProviderConfig } from './base';

export interface OpenAIConfig extends ProviderConfig {
  // OpenAI-specific config
}

export class OpenAIProvider extends LLMProvider {
  readonly name = 'openai';
  private openAI: ReturnType<typeof createOpenAI>;

  constructor(config: OpenAIConfig) {
    super(config);
    this.openAI = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  protected languageModel(modelId: string): LanguageModel {
    // Compatible endpoints (e.g. Gemini's or a local server) only speak
    // Chat Completions, not the Responses API
    return this.config.baseURL ? this.openAI.chat(modelId) : this.openAI(modelId);
  }
}
