/**
 * Side-by-side extraction runs under each schema formatting mode
 */

import { FORMATTING_MODES, type FormattingMode } from '../schema/format';
import type { StructuredObject } from '../schema/types';
import type { SchemaGuidedExtractor } from './extractor';
import type { ExtractionRequest } from './types';

/** Outcome of the extraction run under one formatting mode */
export interface ModeComparison {
  mode: FormattingMode;
  success: boolean;
  attempts: number;
  /** Validated value, present on success */
  value?: StructuredObject;
  /** Reason the final attempt failed, present on failure */
  reason?: string;
}

/**
 * Run the same extraction once per formatting mode, one after another,
 * and report how each rendering fared.
 *
 * @throws SchemaError when the schema or retry count is invalid
 */
export async function compareFormattingModes(
  extractor: SchemaGuidedExtractor,
  request: Omit<ExtractionRequest, 'formattingMode'>,
  modes: readonly FormattingMode[] = FORMATTING_MODES
): Promise<ModeComparison[]> {
  const comparisons: ModeComparison[] = [];
  for (const mode of modes) {
    const result = await extractor.extract({ ...request, formattingMode: mode });
    comparisons.push(
      result.success
        ? { mode, success: true, attempts: result.attempts, value: result.value }
        : { mode, success: false, attempts: result.attempts, reason: result.reason }
    );
  }
  return comparisons;
}
