/**
 * Base provider interface for text-generation backends
 */

import { APICallError, generateText, type LanguageModel } from 'ai';
import { BackendError, ConfigError } from '../errors';

/** Per-call options passed to a backend */
export interface CompletionOptions {
  /** Model identifier */
  model: string;
  /** Temperature (0-2) */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Time limit for the call in milliseconds */
  timeoutMs?: number;
  /** Aborted when the caller gives up or the time limit passes */
  signal?: AbortSignal;
}

/**
 * A black-box text completion service.
 * Implementations reject with BackendError on network, timeout or quota failures.
 */
export interface TextGenerator {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/** Provider configuration */
export interface ProviderConfig {
  /** API key for the provider */
  apiKey: string;
  /** Base URL for API (for custom or compatible endpoints) */
  baseURL?: string;
  /** Retries performed inside the AI SDK for transient HTTP failures (default: 0) */
  sdkRetries?: number;
}

/** Abstract base class for LLM providers backed by the Vercel AI SDK */
export abstract class LLMProvider implements TextGenerator {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /** Resolve a model identifier to an AI SDK language model */
  protected abstract languageModel(modelId: string): LanguageModel;

  /** Provider name used in logs and transcripts */
  abstract readonly name: string;

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    try {
      const result = await generateText({
        model: this.languageModel(options.model),
        prompt,
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
        abortSignal: options.signal,
        maxRetries: this.config.sdkRetries ?? 0,
      });
      return result.text;
    } catch (error) {
      throw toBackendError(error, options.signal);
    }
  }
}

/**
 * Translate any failure raised while calling a backend into a BackendError
 * @param signal - The call's abort signal, consulted to tell aborts apart
 */
export function toBackendError(error: unknown, signal?: AbortSignal): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  if (signal?.aborted || isAbortError(error)) {
    const reason: unknown = signal?.reason;
    if (reason instanceof BackendError) {
      return reason;
    }
    return new BackendError('request aborted', 'aborted', { cause: error });
  }
  if (APICallError.isInstance(error)) {
    const statusCode = error.statusCode;
    const kind = statusCode === 429 ? 'quota' : 'transport';
    return new BackendError(`backend request failed: ${error.message}`, kind, { cause: error, statusCode });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(`backend request failed: ${message}`, 'unknown', { cause: error });
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/** Provider factory type */
export type ProviderFactory = (config: ProviderConfig) => LLMProvider;

/** Registry of available providers */
export class ProviderRegistry {
  private providers = new Map<string, ProviderFactory>();

  register(name: string, factory: ProviderFactory): void {
    this.providers.set(name, factory);
  }

  create(name: string, config: ProviderConfig): LLMProvider {
    const factory = this.providers.get(name);
    if (!factory) {
      throw new ConfigError(`Unknown provider: ${name}`);
    }
    return factory(config);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}
