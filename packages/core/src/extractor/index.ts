export {
  SchemaGuidedExtractor,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  BACKEND_TIMEOUT_REASON,
  REQUEST_ABORTED_REASON,
} from './extractor';
export { compareFormattingModes, type ModeComparison } from './compare';
export {
  buildExtractionPrompt,
  buildCorrectivePrompt,
  SCHEMA_BLOCK_START,
  SCHEMA_BLOCK_END,
  type ExtractionPromptInput,
  type CorrectivePromptInput,
} from './prompts';
export type {
  ExtractionRequest,
  ExtractorOptions,
  AttemptOutcome,
  AttemptRecord,
  ExtractionSuccess,
  ExtractionFailure,
  ExtractionResult,
} from './types';
