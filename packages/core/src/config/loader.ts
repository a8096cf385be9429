/**
 * Extractor configuration
 *
 * Settings come from an explicit environment map plus caller overrides;
 * nothing is read from or cached in module state.
 */

import { z } from 'zod';
import { ConfigError } from '../errors';
import { SchemaGuidedExtractor } from '../extractor/extractor';
import {
  AnthropicProvider,
  createProvider,
  detectProvider,
  type ProviderName,
  type TextGenerator,
} from '../providers';
import type { FormattingMode } from '../schema/format';
import { Logger, type LogLevel } from '../utils/logger';

export interface ExtractorConfig {
  provider: ProviderName;
  model: string;
  /** API key for the selected provider */
  apiKey?: string;
  /** Bearer token, Anthropic-compatible endpoints only */
  authToken?: string;
  baseURL?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  formattingMode: FormattingMode;
  logLevel: LogLevel;
}

export type ExtractorConfigOverrides = Partial<ExtractorConfig>;

/** Environment map, typically process.env */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

/** Model used when neither SX_MODEL nor an override names one */
export const DEFAULT_MODELS: Readonly<Record<ProviderName, string>> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  google: 'gemini-2.0-flash',
};

const configSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'google']).optional(),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  authToken: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  temperature: z.coerce.number().min(0).max(2).default(0.2),
  maxTokens: z.coerce.number().int().positive().default(4096),
  timeoutMs: z.coerce.number().int().positive().max(2_147_483_647).default(60_000),
  maxRetries: z.coerce.number().int().min(0).default(2),
  formattingMode: z.enum(['indented', 'compact', 'json-schema']).default('indented'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/** Environment variable read for each setting */
export const CONFIG_ENV_VARS = {
  provider: 'SX_PROVIDER',
  model: 'SX_MODEL',
  baseURL: 'SX_BASE_URL',
  temperature: 'SX_TEMPERATURE',
  maxTokens: 'SX_MAX_TOKENS',
  timeoutMs: 'SX_TIMEOUT_MS',
  maxRetries: 'SX_MAX_RETRIES',
  formattingMode: 'SX_FORMAT',
  logLevel: 'SX_LOG_LEVEL',
} as const satisfies Partial<Record<keyof ExtractorConfig, string>>;

/**
 * Resolve extractor settings.
 *
 * Overrides win over the environment, which wins over defaults. When no
 * provider is named it is detected from the model; the API key is taken
 * from that provider's variable (OPENAI_API_KEY, ANTHROPIC_API_KEY or
 * ANTHROPIC_AUTH_TOKEN, GEMINI_API_KEY) unless given explicitly.
 *
 * @throws ConfigError when a value is malformed or out of range
 */
export function loadExtractorConfig(env: ConfigEnv, overrides: ExtractorConfigOverrides = {}): ExtractorConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const parsed = configSchema.safeParse({
    provider: overrides.provider ?? read(CONFIG_ENV_VARS.provider),
    model: overrides.model ?? read(CONFIG_ENV_VARS.model),
    apiKey: overrides.apiKey,
    authToken: overrides.authToken,
    baseURL: overrides.baseURL ?? read(CONFIG_ENV_VARS.baseURL),
    temperature: overrides.temperature ?? read(CONFIG_ENV_VARS.temperature),
    maxTokens: overrides.maxTokens ?? read(CONFIG_ENV_VARS.maxTokens),
    timeoutMs: overrides.timeoutMs ?? read(CONFIG_ENV_VARS.timeoutMs),
    maxRetries: overrides.maxRetries ?? read(CONFIG_ENV_VARS.maxRetries),
    formattingMode: overrides.formattingMode ?? read(CONFIG_ENV_VARS.formattingMode),
    logLevel: overrides.logLevel ?? read(CONFIG_ENV_VARS.logLevel),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const { provider: requestedProvider, model: requestedModel, apiKey, authToken, ...settings } = parsed.data;
  const provider = requestedProvider ?? (requestedModel ? detectProvider(requestedModel) : 'openai');
  const model = requestedModel ?? DEFAULT_MODELS[provider];
  const credentials = apiKey || authToken ? { apiKey, authToken } : credentialsFromEnv(provider, read);

  return {
    provider,
    model,
    ...(credentials.apiKey ? { apiKey: credentials.apiKey } : {}),
    ...(credentials.authToken ? { authToken: credentials.authToken } : {}),
    ...settings,
  };
}

function credentialsFromEnv(
  provider: ProviderName,
  read: (name: string) => string | undefined
): { apiKey?: string; authToken?: string } {
  switch (provider) {
    case 'google':
      return { apiKey: read('GEMINI_API_KEY') };
    case 'anthropic': {
      const apiKey = read('ANTHROPIC_API_KEY');
      return apiKey ? { apiKey } : { authToken: read('ANTHROPIC_AUTH_TOKEN') };
    }
    case 'openai':
      return { apiKey: read('OPENAI_API_KEY') };
  }
}

const API_KEY_VARS: Readonly<Record<ProviderName, string>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GEMINI_API_KEY',
};

export interface CreateExtractorOptions {
  /** Use this backend instead of building one from the provider settings */
  backend?: TextGenerator;
  /** Defaults to a new logger at config.logLevel */
  logger?: Logger;
}

/**
 * Build an extractor from resolved settings.
 * @throws ConfigError when no backend is supplied and the provider has no API key
 */
export function createExtractor(config: ExtractorConfig, options: CreateExtractorOptions = {}): SchemaGuidedExtractor {
  const backend = options.backend ?? createBackend(config);

  return new SchemaGuidedExtractor(backend, {
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    formattingMode: config.formattingMode,
    logger: options.logger ?? new Logger(config.logLevel),
  });
}

function createBackend(config: ExtractorConfig): TextGenerator {
  const hasToken = config.provider === 'anthropic' && config.authToken !== undefined;
  if (!config.apiKey && !hasToken) {
    throw new ConfigError(
      `${config.provider} API key is required. Provide it via apiKey or the ${API_KEY_VARS[config.provider]} environment variable.`
    );
  }

  if (hasToken) {
    return new AnthropicProvider({ apiKey: config.apiKey ?? '', authToken: config.authToken, baseURL: config.baseURL });
  }
  return createProvider(config.provider, { apiKey: config.apiKey ?? '', baseURL: config.baseURL });
}
