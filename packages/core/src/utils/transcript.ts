/**
 * Transcript conversion utility
 * Converts an ExtractionResult into a JSON document describing every
 * exchange with the model, suitable for writing to disk.
 */

import type { AttemptOutcome, ExtractionResult } from '../extractor/types';
import type { StructuredObject } from '../schema/types';

export const TRANSCRIPT_SCHEMA_VERSION = 'sx-transcript-v1';

/** One backend round trip */
export interface TranscriptStep {
  step_id: number;
  outcome: AttemptOutcome;
  prompt: string;
  response?: string;
  problems?: string[];
  duration_ms: number;
}

/** How the extraction ended */
export type TranscriptFinal =
  | { value: StructuredObject }
  | { reason: string; reasons: string[]; last_response?: string };

export interface Transcript {
  schema_version: typeof TRANSCRIPT_SCHEMA_VERSION;
  model: string;
  schema_name?: string;
  status: 'success' | 'failure';
  attempts: number;
  steps: TranscriptStep[];
  final: TranscriptFinal;
  total_duration_ms: number;
}

/** Options for toTranscript */
export interface ToTranscriptOptions {
  /** Model identifier the extraction ran against */
  model: string;
  /** Schema name (defaults to none) */
  schemaName?: string;
}

/**
 * Convert an extraction result to a transcript.
 *
 * Mapping rules:
 * - each history record -> one step, numbered from 1
 * - problems are only listed for rejected attempts
 * - success -> final.value; failure -> final.reason, final.reasons and
 *   final.last_response when a response was received
 */
export function toTranscript(result: ExtractionResult, options: ToTranscriptOptions): Transcript {
  const steps: TranscriptStep[] = result.history.map((record) => ({
    step_id: record.attempt,
    outcome: record.outcome,
    prompt: record.prompt,
    ...(record.response !== undefined ? { response: record.response } : {}),
    ...(record.problems.length > 0 ? { problems: [...record.problems] } : {}),
    duration_ms: record.durationMs,
  }));

  const final: TranscriptFinal = result.success
    ? { value: result.value }
    : {
        reason: result.reason,
        reasons: [...result.reasons],
        ...(result.lastResponse !== undefined ? { last_response: result.lastResponse } : {}),
      };

  return {
    schema_version: TRANSCRIPT_SCHEMA_VERSION,
    model: options.model,
    ...(options.schemaName ? { schema_name: options.schemaName } : {}),
    status: result.success ? 'success' : 'failure',
    attempts: result.attempts,
    steps,
    final,
    total_duration_ms: steps.reduce((total, step) => total + step.duration_ms, 0),
  };
}
