/**
 * Request and corrective prompt templates
 */

export const SCHEMA_BLOCK_START = '<schema>';
export const SCHEMA_BLOCK_END = '</schema>';

export interface ExtractionPromptInput {
  /** Caller's natural-language instructions */
  instructions: string;
  /** Schema as rendered by formatSchema */
  schemaText: string;
}

export interface CorrectivePromptInput extends ExtractionPromptInput {
  /** Raw text of the rejected response */
  previousResponse: string;
  /** One entry per violated constraint or parse problem */
  problems: string[];
}

/**
 * Build the initial request: instructions, the delimited schema block,
 * and a directive to return only a conforming JSON object.
 */
export function buildExtractionPrompt({ instructions, schemaText }: ExtractionPromptInput): string {
  return `${instructions.trim()}

Respond with a single JSON object that matches this schema:

${SCHEMA_BLOCK_START}
${schemaText}
${SCHEMA_BLOCK_END}

Rules:
- Include every required field.
- Respect each field's type and constraints.
- Do not add explanations or comments before or after the JSON.

Return only the JSON object.`;
}

/** Build a follow-up request that quotes the rejected response and what was wrong with it */
export function buildCorrectivePrompt(input: CorrectivePromptInput): string {
  const problems = input.problems.map((problem) => `- ${problem}`).join('\n');

  return `${buildExtractionPrompt(input)}

Your previous response could not be accepted:

<previous_response>
${input.previousResponse}
</previous_response>

Problems found:
${problems}

Return a corrected JSON object that fixes every problem listed above.`;
}
