/**
 * Structured Output Decoding
 *
 * Two decoder tiers, both returning a tagged result:
 * - strict: validates a value the provider already parsed against the schema
 * - lenient: recovers JSON from free text (code fences, surrounding prose)
 *   and then validates it the same way
 */

import type { z } from 'zod';

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Returns the body of the first fenced code block, or the text unchanged.
 */
export function stripCodeFences(text: string): string {
  const match = FENCED_BLOCK.exec(text);
  return match?.[1] !== undefined ? match[1].trim() : text;
}

/**
 * Isolates the span from the first `{` to the last `}`.
 * Returns the trimmed text when no such span exists.
 */
export function extractJsonCandidate(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return text.slice(start, end + 1);
  }
  return text.trim();
}

/**
 * Lists zod issues as `path: message` strings.
 */
export function listSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function formatSchemaIssues(error: z.ZodError): string {
  return listSchemaIssues(error).join('; ');
}

/**
 * Strict tier: schema validation of an already-parsed value.
 */
export function decodeStrict<T>(schema: z.ZodType<T>, value: unknown): DecodeResult<T> {
  if (value === undefined || value === null) {
    return { ok: false, error: 'no structured output was produced' };
  }
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, error: `schema validation failed: ${formatSchemaIssues(parsed.error)}` };
}

/**
 * Lenient tier: strip fences, bracket-match, parse, validate.
 */
export function decodeLenient<T>(schema: z.ZodType<T>, text: string): DecodeResult<T> {
  if (text.trim().length === 0) {
    return { ok: false, error: 'response text was empty' };
  }

  const candidate = extractJsonCandidate(stripCodeFences(text));

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `response was not valid JSON: ${detail}` };
  }

  return decodeStrict(schema, data);
}
