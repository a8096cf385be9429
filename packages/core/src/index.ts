/**
 * structured-extract - Core API
 * One-shot extract function plus the schema, extractor and provider building blocks
 */

import { createExtractor, loadExtractorConfig, type ConfigEnv, type ExtractorConfigOverrides } from './config/loader';
import type { ExtractionResult } from './extractor/types';
import type { SchemaDescriptor } from './schema/types';

export interface ExtractOptions extends ExtractorConfigOverrides {
  /** Environment to read settings and API keys from (default: process.env) */
  env?: ConfigEnv;
  /** Abort the extraction */
  signal?: AbortSignal;
}

/**
 * Run a single extraction against a provider chosen from the options and environment.
 *
 * @example
 * ```typescript
 * import { extract, defineSchema, Schema } from 'structured-extract';
 *
 * const person = defineSchema({
 *   name: Schema.string(),
 *   age: Schema.number({ integer: true, minimum: 0 }),
 * });
 *
 * const result = await extract('Extract the person in: "Ana turned 34 today."', person, {
 *   model: 'gpt-4o-mini',
 *   apiKey: process.env.OPENAI_API_KEY,
 * });
 * if (result.success) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.reason);
 * }
 * ```
 *
 * @throws SchemaError when the schema is empty or malformed
 * @throws ConfigError when settings are invalid or no API key is available
 */
export async function extract(
  instructions: string,
  schema: SchemaDescriptor,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const { env = process.env, signal, ...overrides } = options;
  const config = loadExtractorConfig(env, overrides);
  const extractor = createExtractor(config);
  return extractor.extract({ instructions, schema, signal });
}

// Schema descriptors, formatting and validation
export * from './schema';

// Payload parsing
export { parseStructuredPayload } from './parse/payload';

// Extractor
export * from './extractor';

// Providers
export * from './providers';

// Configuration
export * from './config';

// Errors
export {
  ExtractionError,
  SchemaError,
  ConfigError,
  BackendError,
  ParseError,
  ValidationError,
  type ValidationIssue,
  type ValidationIssueCode,
  type BackendErrorKind,
} from './errors';

// Logging
export { Logger, logger, LOG_LEVELS, isLogLevel, type LogLevel } from './utils/logger';

// Transcripts
export {
  toTranscript,
  TRANSCRIPT_SCHEMA_VERSION,
  type Transcript,
  type TranscriptStep,
  type TranscriptFinal,
  type ToTranscriptOptions,
} from './utils/transcript';
