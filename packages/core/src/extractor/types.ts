/**
 * Extraction request and result types
 */

import type { FormattingMode } from '../schema/format';
import type { SchemaDescriptor, StructuredObject } from '../schema/types';
import type { Logger } from '../utils/logger';

/** One extraction call; created per call and never persisted */
export interface ExtractionRequest {
  /** Natural-language instructions for the model */
  instructions: string;
  /** Expected output shape */
  schema: SchemaDescriptor;
  /** Corrective retries after the first attempt (defaults to the extractor's setting) */
  maxRetries?: number;
  /** How the schema is rendered into the prompt (defaults to the extractor's setting) */
  formattingMode?: FormattingMode;
  /** Abort the call; no further attempts are made once it fires */
  signal?: AbortSignal;
}

/** Settings fixed when an extractor is constructed */
export interface ExtractorOptions {
  /** Model identifier passed to the backend */
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Time limit per backend call in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Default: 2 */
  maxRetries?: number;
  /** Default: 'indented' */
  formattingMode?: FormattingMode;
  /** Defaults to the shared logger */
  logger?: Logger;
}

export type AttemptOutcome = 'success' | 'backend_error' | 'parse_error' | 'validation_error';

/** What happened during a single backend round trip */
export interface AttemptRecord {
  /** 1-based attempt number */
  attempt: number;
  /** Prompt sent to the backend */
  prompt: string;
  /** Raw response text, absent when the backend call failed */
  response?: string;
  outcome: AttemptOutcome;
  /** Problems found with the response (empty on success) */
  problems: string[];
  durationMs: number;
}

export interface ExtractionSuccess {
  success: true;
  /** Payload validated against every field constraint */
  value: StructuredObject;
  /** Number of backend attempts made */
  attempts: number;
  history: AttemptRecord[];
}

export interface ExtractionFailure {
  success: false;
  /** Reason the final attempt failed */
  reason: string;
  /** One reason per failed attempt, in order */
  reasons: string[];
  /** Raw text of the last response received, if any */
  lastResponse?: string;
  /** Number of backend attempts made */
  attempts: number;
  history: AttemptRecord[];
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;
