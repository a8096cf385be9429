/**
 * Error classes for structured extraction
 */

/** A single schema constraint violated by a parsed payload */
export interface ValidationIssue {
  /** Dotted path to the offending value ('' for the payload root) */
  path: string;
  /** Which kind of constraint failed */
  code: ValidationIssueCode;
  /** Human-readable description, prefixed with the path */
  message: string;
}

export type ValidationIssueCode =
  | 'missing'
  | 'type'
  | 'enum'
  | 'range'
  | 'length'
  | 'pattern'
  | 'items'
  | 'unknown_field';

/** Failure classes reported by text-generation backends */
export type BackendErrorKind = 'timeout' | 'aborted' | 'transport' | 'quota' | 'unknown';

/** Base extraction error */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/** The schema descriptor itself is empty or malformed */
export class SchemaError extends ExtractionError {
  constructor(message: string) {
    super(message, 'SCHEMA_ERROR');
    this.name = 'SchemaError';
  }
}

/** Configuration values are missing or invalid */
export class ConfigError extends ExtractionError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** The text-generation backend failed, timed out or was unreachable */
export class BackendError extends ExtractionError {
  /** HTTP status returned by the backend, when there was one */
  statusCode?: number;

  constructor(
    message: string,
    public kind: BackendErrorKind,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, 'BACKEND_ERROR', { cause: options?.cause });
    this.name = 'BackendError';
    this.statusCode = options?.statusCode;
  }
}

/** The backend response contains no extractable structured payload */
export class ParseError extends ExtractionError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/** A parsed payload violates one or more schema constraints */
export class ValidationError extends ExtractionError {
  constructor(public issues: ValidationIssue[]) {
    super(issues.map((issue) => issue.message).join('; '), 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
