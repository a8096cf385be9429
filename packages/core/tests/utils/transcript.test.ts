import { describe, it, expect } from 'vitest';
import { toTranscript } from '../../src/utils/transcript';
import type { ExtractionFailure, ExtractionSuccess } from '../../src/extractor/types';

describe('toTranscript', () => {
  it('should convert a successful extraction', () => {
    const result: ExtractionSuccess = {
      success: true,
      value: { name: 'Ana' },
      attempts: 2,
      history: [
        {
          attempt: 1,
          prompt: 'first prompt',
          response: '{}',
          outcome: 'validation_error',
          problems: ['name: required field is missing'],
          durationMs: 5,
        },
        { attempt: 2, prompt: 'second prompt', response: '{"name": "Ana"}', outcome: 'success', problems: [], durationMs: 7 },
      ],
    };

    expect(toTranscript(result, { model: 'test-model', schemaName: 'person' })).toEqual({
      schema_version: 'sx-transcript-v1',
      model: 'test-model',
      schema_name: 'person',
      status: 'success',
      attempts: 2,
      steps: [
        {
          step_id: 1,
          outcome: 'validation_error',
          prompt: 'first prompt',
          response: '{}',
          problems: ['name: required field is missing'],
          duration_ms: 5,
        },
        { step_id: 2, outcome: 'success', prompt: 'second prompt', response: '{"name": "Ana"}', duration_ms: 7 },
      ],
      final: { value: { name: 'Ana' } },
      total_duration_ms: 12,
    });
  });

  it('should convert a failed extraction', () => {
    const result: ExtractionFailure = {
      success: false,
      reason: 'backend timeout',
      reasons: ['backend timeout'],
      attempts: 1,
      history: [{ attempt: 1, prompt: 'only prompt', outcome: 'backend_error', problems: ['backend timeout'], durationMs: 20 }],
    };

    const transcript = toTranscript(result, { model: 'test-model' });

    expect(transcript.status).toBe('failure');
    expect(transcript.steps).toEqual([
      { step_id: 1, outcome: 'backend_error', prompt: 'only prompt', problems: ['backend timeout'], duration_ms: 20 },
    ]);
    expect(transcript.final).toEqual({ reason: 'backend timeout', reasons: ['backend timeout'] });
    expect('last_response' in transcript.final).toBe(false);
    expect('schema_name' in transcript).toBe(false);
  });

  it('should keep the last response of a failed extraction', () => {
    const result: ExtractionFailure = {
      success: false,
      reason: 'no JSON object found in response',
      reasons: ['no JSON object found in response'],
      lastResponse: 'Sorry.',
      attempts: 1,
      history: [
        { attempt: 1, prompt: 'p', response: 'Sorry.', outcome: 'parse_error', problems: ['no JSON object found in response'], durationMs: 3 },
      ],
    };

    expect(toTranscript(result, { model: 'test-model' }).final).toEqual({
      reason: 'no JSON object found in response',
      reasons: ['no JSON object found in response'],
      last_response: 'Sorry.',
    });
  });
});
