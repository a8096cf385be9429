/**
 * Schema-guided extractor
 *
 * Sends a schema-bearing prompt to a text-generation backend, then parses
 * and validates the reply. Rejected replies are fed back in a corrective
 * prompt until the retries run out.
 */

import { BackendError, ConfigError, ParseError, SchemaError, ValidationError } from '../errors';
import { parseStructuredPayload } from '../parse/payload';
import { toBackendError, type TextGenerator } from '../providers/base';
import { assertSchemaDescriptor } from '../schema/descriptor';
import { formatSchema, type FormattingMode } from '../schema/format';
import type { SchemaDescriptor, StructuredObject } from '../schema/types';
import { validatePayload } from '../schema/validate';
import { logger as sharedLogger, type Logger } from '../utils/logger';
import { buildCorrectivePrompt, buildExtractionPrompt } from './prompts';
import type {
  AttemptOutcome,
  AttemptRecord,
  ExtractionRequest,
  ExtractionResult,
  ExtractorOptions,
} from './types';

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 2;
export const BACKEND_TIMEOUT_REASON = 'backend timeout';
export const REQUEST_ABORTED_REASON = 'request aborted';

/** Largest delay setTimeout accepts without firing immediately */
const MAX_TIMEOUT_MS = 2_147_483_647;

type Evaluation =
  | { ok: true; value: StructuredObject }
  | { ok: false; outcome: Exclude<AttemptOutcome, 'success' | 'backend_error'>; problems: string[] };

/**
 * Turns a schema plus instructions into a validated structured value.
 *
 * Holds only its construction-time settings, so one instance can serve
 * any number of concurrent extract calls.
 *
 * @example
 * ```typescript
 * const extractor = new SchemaGuidedExtractor(new OpenAIProvider({ apiKey }), { model: 'gpt-4o-mini' });
 * const result = await extractor.extract({
 *   instructions: 'Extract the person mentioned in: "Ana is 34."',
 *   schema: defineSchema({ name: Schema.string(), age: Schema.number() }),
 * });
 * if (result.success) console.log(result.value);
 * ```
 */
export class SchemaGuidedExtractor {
  private readonly backend: TextGenerator;
  private readonly model: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly formattingMode: FormattingMode;
  private readonly logger: Logger;

  constructor(backend: TextGenerator, options: ExtractorOptions) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new ConfigError(`timeoutMs must be a positive integer no larger than ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
    }

    this.backend = backend;
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = timeoutMs;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.formattingMode = options.formattingMode ?? 'indented';
    this.logger = options.logger ?? sharedLogger;
  }

  /**
   * Run one extraction.
   *
   * Backend, parse and validation failures are retried up to `maxRetries`
   * times and end in a failure result; nothing but SchemaError is thrown.
   *
   * @throws SchemaError when the schema is empty/malformed or maxRetries is invalid
   */
  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    assertSchemaDescriptor(request.schema);
    const maxRetries = request.maxRetries ?? this.maxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new SchemaError(`maxRetries must be an integer >= 0, got ${maxRetries}`);
    }

    const schemaText = formatSchema(request.schema, request.formattingMode ?? this.formattingMode);
    const promptInput = { instructions: request.instructions, schemaText };
    const totalAttempts = maxRetries + 1;

    let prompt = buildExtractionPrompt(promptInput);
    let lastResponse: string | undefined;
    const history: AttemptRecord[] = [];
    const reasons: string[] = [];

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      const startedAt = Date.now();
      this.logger.debug(`Extraction attempt ${attempt}/${totalAttempts} (model: ${this.model})`);

      let response: string;
      try {
        response = await this.complete(prompt, request.signal);
      } catch (error) {
        const backendError = toBackendError(error);
        history.push({
          attempt,
          prompt,
          outcome: 'backend_error',
          problems: [backendError.message],
          durationMs: Date.now() - startedAt,
        });
        reasons.push(backendError.message);
        this.logger.warn(`Extraction attempt ${attempt}/${totalAttempts} failed: ${backendError.message}`);
        if (backendError.kind === 'aborted') {
          break;
        }
        continue;
      }

      lastResponse = response;
      const evaluation = evaluate(request.schema, response);
      const durationMs = Date.now() - startedAt;

      if (evaluation.ok) {
        history.push({ attempt, prompt, response, outcome: 'success', problems: [], durationMs });
        this.logger.debug(`Extraction succeeded on attempt ${attempt}`);
        return { success: true, value: evaluation.value, attempts: attempt, history };
      }

      history.push({ attempt, prompt, response, outcome: evaluation.outcome, problems: evaluation.problems, durationMs });
      const reason = evaluation.problems.join('; ');
      reasons.push(reason);
      this.logger.warn(`Extraction attempt ${attempt}/${totalAttempts} rejected: ${reason}`);

      prompt = buildCorrectivePrompt({
        ...promptInput,
        previousResponse: response,
        problems: evaluation.problems,
      });
    }

    return {
      success: false,
      reason: reasons[reasons.length - 1],
      reasons,
      ...(lastResponse !== undefined ? { lastResponse } : {}),
      attempts: history.length,
      history,
    };
  }

  /**
   * Call the backend under the time limit and the caller's signal.
   * Stops waiting once the time limit passes, even if the backend ignores its signal.
   */
  private async complete(prompt: string, callerSignal?: AbortSignal): Promise<string> {
    if (callerSignal?.aborted) {
      throw new BackendError(REQUEST_ABORTED_REASON, 'aborted');
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new BackendError(BACKEND_TIMEOUT_REASON, 'timeout'));
    }, this.timeoutMs);
    const onCallerAbort = (): void => {
      controller.abort(new BackendError(REQUEST_ABORTED_REASON, 'aborted'));
    };
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await Promise.race([
        this.backend.complete(prompt, {
          model: this.model,
          temperature: this.temperature,
          maxTokens: this.maxTokens,
          timeoutMs: this.timeoutMs,
          signal: controller.signal,
        }),
        rejectOnAbort(controller.signal),
      ]);
    } catch (error) {
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof BackendError) {
        throw reason;
      }
      throw toBackendError(error);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function evaluate(schema: SchemaDescriptor, response: string): Evaluation {
  try {
    const payload = parseStructuredPayload(response);
    return { ok: true, value: validatePayload(schema, payload) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, outcome: 'parse_error', problems: [error.message] };
    }
    if (error instanceof ValidationError) {
      return { ok: false, outcome: 'validation_error', problems: error.issues.map((issue) => issue.message) };
    }
    throw error;
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
