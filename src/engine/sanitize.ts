import type { z } from 'zod';
import { MalformedResponseError } from '../errors';

/**
 * Pull a JSON object out of a freeform model reply. Prefers a fenced
 * block, then the outermost `{...}` span, then the whole text.
 */
export function extractJson(text: string): string {
  const fence = text.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/);
  if (fence) return fence[1];
  const brace = text.match(/\{[\s\S]*\}/);
  if (brace) return brace[0];
  return text.trim();
}

export function parseJsonObject(text: string): Record<string, unknown> {
  const payload = extractJson(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    throw new MalformedResponseError('RESPONSE_NOT_JSON', 'Model reply is not valid JSON');
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new MalformedResponseError('RESPONSE_SCHEMA_INVALID', 'Model reply must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/** Parse a JSON reply and validate it; any deviation is a malformed response. */
export function validateReply<S extends z.ZodTypeAny>(schema: S, text: string, what: string): z.output<S> {
  const result = schema.safeParse(parseJsonObject(text));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new MalformedResponseError(
      'RESPONSE_SCHEMA_INVALID',
      `${what} does not match the expected shape: ${issues.join('; ')}`,
      issues
    );
  }
  return result.data;
}
