/**
 * Locating a structured payload inside free-form model output
 */

import { ParseError } from '../errors';
import { isJsonObject, type JsonObject } from '../schema/types';

/** Matches ```json ... ``` (or any/no language tag) fenced blocks */
const FENCED_BLOCK_REGEX = /```[\w-]*[^\S\r\n]*\r?\n?([\s\S]*?)```/g;

/**
 * Extract the first JSON object found in a model response.
 *
 * Tries, in order: fenced code blocks, the whole trimmed text, then
 * every balanced `{...}` span in the text. Surrounding commentary and
 * whitespace are ignored.
 *
 * @throws ParseError when the response holds no parsable JSON object
 */
export function parseStructuredPayload(raw: string): JsonObject {
  const text = raw.trim();
  if (text === '') {
    throw new ParseError('response was empty');
  }

  for (const candidate of candidates(text)) {
    const value = tryParseJson(candidate);
    if (isJsonObject(value)) {
      return value;
    }
  }

  throw new ParseError('no JSON object found in response');
}

function* candidates(text: string): Generator<string> {
  for (const match of text.matchAll(FENCED_BLOCK_REGEX)) {
    yield match[1].trim();
  }
  yield text;
  yield* balancedObjects(text);
}

/**
 * Every balanced `{...}` span in the text, outermost first.
 * One pass with a stack of open braces; quotes only count inside a span.
 */
function* balancedObjects(text: string): Generator<string> {
  const spans: Array<[number, number]> = [];
  const open: number[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && open.length > 0) {
      inString = true;
    } else if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) spans.push([start, i]);
    }
  }

  spans.sort((a, b) => a[0] - b[0]);
  for (const [start, end] of spans) {
    yield text.slice(start, end + 1);
  }
}

function tryParseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
