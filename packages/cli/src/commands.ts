/**
 * sx command implementations
 *
 * Commands return their output and exit code instead of writing to the
 * process streams, so the entry point owns all terminal I/O.
 */

import { readFile, writeFile } from 'fs/promises';
import {
  buildExtractionPrompt,
  compareFormattingModes,
  ConfigError,
  createExtractor,
  formatSchema,
  fromJsonSchema,
  loadExtractorConfig,
  parseStructuredPayload,
  ParseError,
  SchemaError,
  toTranscript,
  validatePayload,
  ValidationError,
  type ConfigEnv,
  type ExtractorConfig,
  type Logger,
  type SchemaDescriptor,
  type TextGenerator,
} from 'structured-extract';
import {
  parseArgs,
  USAGE,
  UsageError,
  type CompareArgs,
  type ExtractArgs,
  type PromptArgs,
  type ValidateArgs,
} from './args';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CommandResult {
  exitCode: number;
  /** Primary output (the extracted value, prompt text or JSON report) */
  stdout: string;
  /** Diagnostics for the user */
  stderr: string;
}

export interface CommandContext {
  /** Environment for settings and API keys */
  env: ConfigEnv;
  /** Backend to use instead of the configured provider */
  backend?: TextGenerator;
  logger?: Logger;
}

/** Parse argv and run the selected command */
export async function runCli(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  try {
    const args = parseArgs(argv);
    switch (args.command) {
      case 'help':
        return { exitCode: EXIT_SUCCESS, stdout: USAGE, stderr: '' };
      case 'extract':
        return await runExtract(args, context);
      case 'prompt':
        return await runPrompt(args);
      case 'validate':
        return await runValidate(args);
      case 'compare':
        return await runCompare(args, context);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      return { exitCode: EXIT_USAGE, stdout: '', stderr: `${error.message}\n\n${USAGE}` };
    }
    if (error instanceof SchemaError || error instanceof ConfigError) {
      return { exitCode: EXIT_USAGE, stdout: '', stderr: error.message };
    }
    throw error;
  }
}

/** Run an extraction against the configured backend */
export async function runExtract(args: ExtractArgs, context: CommandContext): Promise<CommandResult> {
  const schema = await loadSchemaFile(args.schemaPath);
  const config = loadCommandConfig(args, context);
  const extractor = createExtractor(config, { backend: context.backend, logger: context.logger });

  const result = await extractor.extract({ instructions: args.instructions, schema });

  if (args.transcriptPath) {
    const transcript = toTranscript(result, { model: config.model, schemaName: schema.name });
    await writeFile(args.transcriptPath, `${JSON.stringify(transcript, null, 2)}\n`, 'utf8');
  }

  if (args.outputFormat === 'json') {
    const report = result.success
      ? { success: true, value: result.value, attempts: result.attempts }
      : { success: false, reason: result.reason, reasons: result.reasons, attempts: result.attempts };
    return {
      exitCode: result.success ? EXIT_SUCCESS : EXIT_FAILURE,
      stdout: JSON.stringify(report),
      stderr: '',
    };
  }

  if (result.success) {
    return { exitCode: EXIT_SUCCESS, stdout: JSON.stringify(result.value, null, 2), stderr: '' };
  }
  return {
    exitCode: EXIT_FAILURE,
    stdout: '',
    stderr: `Extraction failed after ${pluralizeAttempts(result.attempts)}: ${result.reason}`,
  };
}

/** Run the extraction once per formatting mode and report how each fared */
export async function runCompare(args: CompareArgs, context: CommandContext): Promise<CommandResult> {
  const schema = await loadSchemaFile(args.schemaPath);
  const config = loadCommandConfig(args, context);
  const extractor = createExtractor(config, { backend: context.backend, logger: context.logger });

  const comparisons = await compareFormattingModes(extractor, { instructions: args.instructions, schema });
  const exitCode = comparisons.every((comparison) => comparison.success) ? EXIT_SUCCESS : EXIT_FAILURE;

  if (args.outputFormat === 'json') {
    return { exitCode, stdout: JSON.stringify(comparisons), stderr: '' };
  }

  const width = Math.max(...comparisons.map((comparison) => comparison.mode.length));
  const lines = comparisons.map((comparison) => {
    const label = comparison.mode.padEnd(width);
    const attempts = pluralizeAttempts(comparison.attempts);
    return comparison.success
      ? `${label}  ok      ${attempts}`
      : `${label}  failed  ${attempts}: ${comparison.reason ?? ''}`;
  });
  return { exitCode, stdout: lines.join('\n'), stderr: '' };
}

/** Print the request prompt for a schema without calling a backend */
export async function runPrompt(args: PromptArgs): Promise<CommandResult> {
  const schema = await loadSchemaFile(args.schemaPath);
  const schemaText = formatSchema(schema, args.format ?? 'indented');
  return {
    exitCode: EXIT_SUCCESS,
    stdout: buildExtractionPrompt({ instructions: args.instructions, schemaText }),
    stderr: '',
  };
}

/** Parse and validate a saved model response */
export async function runValidate(args: ValidateArgs): Promise<CommandResult> {
  const schema = await loadSchemaFile(args.schemaPath);
  const response = await readInput(args.responsePath, '--response');

  try {
    const value = validatePayload(schema, parseStructuredPayload(response));
    return { exitCode: EXIT_SUCCESS, stdout: JSON.stringify(value, null, 2), stderr: '' };
  } catch (error) {
    if (error instanceof ParseError) {
      return { exitCode: EXIT_FAILURE, stdout: '', stderr: error.message };
    }
    if (error instanceof ValidationError) {
      const problems = error.issues.map((issue) => `- ${issue.message}`).join('\n');
      return { exitCode: EXIT_FAILURE, stdout: '', stderr: `Response does not match the schema:\n${problems}` };
    }
    throw error;
  }
}

/** Read a JSON Schema document from disk and convert it to a descriptor */
export async function loadSchemaFile(path: string): Promise<SchemaDescriptor> {
  const text = await readInput(path, '--schema');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`${path} is not valid JSON: ${message}`);
  }
  return fromJsonSchema(document);
}

function loadCommandConfig(args: ExtractArgs | CompareArgs, context: CommandContext): ExtractorConfig {
  return loadExtractorConfig(context.env, {
    ...(args.model !== undefined ? { model: args.model } : {}),
    ...(args.provider !== undefined ? { provider: args.provider } : {}),
    ...(args.maxRetries !== undefined ? { maxRetries: args.maxRetries } : {}),
    ...(args.command === 'extract' && args.format !== undefined ? { formattingMode: args.format } : {}),
    ...(args.timeoutMs !== undefined ? { timeoutMs: args.timeoutMs } : {}),
  });
}

function pluralizeAttempts(count: number): string {
  return count === 1 ? '1 attempt' : `${count} attempts`;
}

async function readInput(path: string, flag: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`Cannot read ${flag} file ${path}: ${message}`);
  }
}
