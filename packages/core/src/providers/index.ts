/**
 * Provider selection
 */

import { ProviderRegistry, type ProviderConfig, type LLMProvider } from './base';
import { OpenAIProvider } from './openai';
import { AnthropicProvider } from './anthropic';
import { GoogleProvider } from './google';

export type ProviderName = 'openai' | 'anthropic' | 'google';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'google'];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** Registry preloaded with the built-in providers */
export function createDefaultProviderRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.register('openai', (config) => new OpenAIProvider(config));
  registry.register('anthropic', (config) => new AnthropicProvider(config));
  registry.register('google', (config) => new GoogleProvider(config));
  return registry;
}

export const providerRegistry = createDefaultProviderRegistry();

/** Guess the provider from a model name: gemini -> google, claude -> anthropic, else openai */
export function detectProvider(model: string): ProviderName {
  const modelLower = model.toLowerCase();
  if (modelLower.includes('gemini')) return 'google';
  if (modelLower.includes('claude')) return 'anthropic';
  return 'openai';
}

export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  return providerRegistry.create(name, config);
}

export {
  LLMProvider,
  ProviderRegistry,
  toBackendError,
  type TextGenerator,
  type CompletionOptions,
  type ProviderConfig,
  type ProviderFactory,
} from './base';
export { OpenAIProvider, type OpenAIConfig } from './openai';
export { AnthropicProvider, type AnthropicConfig } from './anthropic';
export { GoogleProvider, type GoogleConfig } from './google';
