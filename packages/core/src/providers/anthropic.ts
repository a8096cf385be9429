import { createAnthropic } from '@ai-sdk/anthropic';
import type { LanguageModel } from 'ai';
import { LLMProvider, type ProviderConfig } from './base';

export interface AnthropicConfig extends ProviderConfig {
  /** Auth token for Bearer authentication (used by some compatible endpoints) */
  authToken?: string;
}

export class AnthropicProvider extends LLMProvider {
  readonly name = 'anthropic';
  private anthropic: ReturnType<typeof createAnthropic>;

  constructor(config: AnthropicConfig) {
    super(config);
    this.anthropic = createAnthropic({
      apiKey: config.authToken ? undefined : config.apiKey,
      authToken: config.authToken,
      baseURL: config.baseURL,
    });
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.anthropic(modelId);
  }
}
