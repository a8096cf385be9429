import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';
import { LLMProvider, type ProviderConfig } from './base';

export interface GoogleConfig extends ProviderConfig {
  // Google-specific config
}

export class GoogleProvider extends LLMProvider {
  readonly name = 'google';
  private googleAI: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(config: GoogleConfig) {
    super(config);
    this.googleAI = createGoogleGenerativeAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.googleAI(modelId);
  }
}
