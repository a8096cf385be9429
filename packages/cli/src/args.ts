/**
 * Command-line argument parsing for sx
 */

import { isFormattingMode, isProviderName, type FormattingMode, type ProviderName } from 'structured-extract';

export type OutputFormat = 'text' | 'json';

export interface ExtractArgs {
  command: 'extract';
  instructions: string;
  schemaPath: string;
  model?: string;
  provider?: ProviderName;
  maxRetries?: number;
  format?: FormattingMode;
  timeoutMs?: number;
  transcriptPath?: string;
  outputFormat: OutputFormat;
}

export interface PromptArgs {
  command: 'prompt';
  instructions: string;
  schemaPath: string;
  format?: FormattingMode;
}

export interface ValidateArgs {
  command: 'validate';
  schemaPath: string;
  responsePath: string;
}

export interface CompareArgs {
  command: 'compare';
  instructions: string;
  schemaPath: string;
  model?: string;
  provider?: ProviderName;
  maxRetries?: number;
  timeoutMs?: number;
  outputFormat: OutputFormat;
}

export type CliArgs = ExtractArgs | PromptArgs | ValidateArgs | CompareArgs | { command: 'help' };

/** Bad flags or a missing required flag */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: sx <command> [options]

Commands:
  extract   -p <instructions> --schema <file> [--model <model>] [--provider openai|anthropic|google]
            [--retries <n>] [--format indented|compact|json-schema] [--timeout <ms>]
            [--transcript <file>] [--output-format text|json]
  prompt    --schema <file> -p <instructions> [--format indented|compact|json-schema]
  validate  --schema <file> --response <file>
  compare   -p <instructions> --schema <file> [--model <model>] [--provider openai|anthropic|google]
            [--retries <n>] [--timeout <ms>] [--output-format text|json]

Schema files are JSON Schema documents.`;

const COMMAND_FLAGS: Record<Exclude<CliArgs['command'], 'help'>, readonly string[]> = {
  extract: [
    '-p',
    '--schema',
    '--model',
    '--provider',
    '--retries',
    '--format',
    '--timeout',
    '--transcript',
    '--output-format',
  ],
  prompt: ['-p', '--schema', '--format'],
  validate: ['--schema', '--response'],
  compare: ['-p', '--schema', '--model', '--provider', '--retries', '--timeout', '--output-format'],
};

/**
 * Parse argv (without the node and script entries).
 * @throws UsageError for unknown commands or flags, missing values and malformed numbers
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }
  if (command !== 'extract' && command !== 'prompt' && command !== 'validate' && command !== 'compare') {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const flags = readFlags(rest, COMMAND_FLAGS[command]);
  const schemaPath = requireFlag(flags, '--schema');

  switch (command) {
    case 'extract':
      return {
        command,
        instructions: requireFlag(flags, '-p'),
        schemaPath,
        model: flags.get('--model'),
        provider: optionalProvider(flags.get('--provider')),
        maxRetries: optionalInteger(flags, '--retries'),
        format: optionalFormat(flags.get('--format')),
        timeoutMs: optionalInteger(flags, '--timeout'),
        transcriptPath: flags.get('--transcript'),
        outputFormat: outputFormat(flags.get('--output-format')),
      };
    case 'prompt':
      return {
        command,
        instructions: requireFlag(flags, '-p'),
        schemaPath,
        format: optionalFormat(flags.get('--format')),
      };
    case 'validate':
      return { command, schemaPath, responsePath: requireFlag(flags, '--response') };
    case 'compare':
      return {
        command,
        instructions: requireFlag(flags, '-p'),
        schemaPath,
        model: flags.get('--model'),
        provider: optionalProvider(flags.get('--provider')),
        maxRetries: optionalInteger(flags, '--retries'),
        timeoutMs: optionalInteger(flags, '--timeout'),
        outputFormat: outputFormat(flags.get('--output-format')),
      };
  }
}

function readFlags(args: readonly string[], allowed: readonly string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i += 2) {
    const name = args[i];
    if (!allowed.includes(name)) {
      throw new UsageError(`Unknown option: ${name}`);
    }
    const value = args[i + 1];
    if (value === undefined) {
      throw new UsageError(`Missing value for ${name}`);
    }
    flags.set(name, value);
  }
  return flags;
}

function requireFlag(flags: Map<string, string>, name: string): string {
  const value = flags.get(name);
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`${name} is required`);
  }
  return value;
}

function optionalInteger(flags: Map<string, string>, name: string): number | undefined {
  const raw = flags.get(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function optionalProvider(value: string | undefined): ProviderName | undefined {
  if (value === undefined) return undefined;
  if (!isProviderName(value)) {
    throw new UsageError(`--provider must be one of openai, anthropic, google, got "${value}"`);
  }
  return value;
}

function optionalFormat(value: string | undefined): FormattingMode | undefined {
  if (value === undefined) return undefined;
  if (!isFormattingMode(value)) {
    throw new UsageError(`--format must be one of indented, compact, json-schema, got "${value}"`);
  }
  return value;
}

function outputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text' || value === 'json') {
    return value ?? 'text';
  }
  throw new UsageError(`--output-format must be text or json, got "${value}"`);
}
