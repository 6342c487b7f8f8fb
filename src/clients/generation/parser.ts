/**
 * Generation Response Parser
 *
 * Turns the raw text the model returned into a tagged result. The text may
 * be bare JSON, JSON inside a markdown code fence, or JSON surrounded by
 * prose.
 *
 * @module clients/generation/parser
 */

import { GenerationResponseSchema, type GenerationPayload } from '../../schemas/entry.js';

// ============================================================================
// Types
// ============================================================================

export type GenerationParseResult =
  | { status: 'ok'; payload: GenerationPayload }
  | { status: 'parse_error'; message: string }
  | { status: 'schema_error'; message: string; issues: string[] };

/** Longest excerpt of the raw content quoted in a parse error */
const EXCERPT_LENGTH = 200;

// ============================================================================
// JSON Extraction
// ============================================================================

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract the first JSON value from model output.
 *
 * Tries, in order: the whole text, a ```json fenced block, and the span from
 * the first `{` to the last `}`.
 */
export function extractJson(content: string): { ok: true; value: unknown } | { ok: false } {
  const trimmed = content.trim();

  const direct = tryParseJson(trimmed);
  if (direct.ok) {
    return direct;
  }

  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/.exec(trimmed);
  if (fenced?.[1]) {
    const result = tryParseJson(fenced[1]);
    if (result.ok) {
      return result;
    }
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParseJson(trimmed.slice(start, end + 1));
  }

  return { ok: false };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse and validate a generation response.
 *
 * @example
 * const result = parseGenerationResponse(content);
 * if (result.status === 'ok') entries.set(word, { ...enriched, ...result.payload });
 */
export function parseGenerationResponse(content: string): GenerationParseResult {
  const extracted = extractJson(content);
  if (!extracted.ok) {
    const excerpt = content.length > EXCERPT_LENGTH ? `${content.slice(0, EXCERPT_LENGTH)}...` : content;
    return {
      status: 'parse_error',
      message: `Could not extract JSON from response: ${excerpt}`,
    };
  }

  if (typeof extracted.value !== 'object' || extracted.value === null || Array.isArray(extracted.value)) {
    return {
      status: 'schema_error',
      message: 'Response is not a JSON object',
      issues: ['expected object'],
    };
  }

  const result = GenerationResponseSchema.safeParse(extracted.value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return {
      status: 'schema_error',
      message: result.error.issues[0]?.message ?? 'Invalid generation response',
      issues,
    };
  }

  return { status: 'ok', payload: result.data };
}
