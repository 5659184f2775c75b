/**
 * Response parsing - recovers the JSON payload from the Dialogue Model reply
 *
 * Exactly two wrapping styles are recognized: bare JSON and a single
 * code-fenced block (optionally with a language tag). Anything else fails.
 */

import { ScriptGenerationError } from '../errors';

export type ParseResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: ScriptGenerationError };

const FENCE = '```';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) {
    return trimmed;
  }

  const firstNewline = trimmed.indexOf('\n');
  if (firstNewline < 0) {
    return '';
  }

  let body = trimmed.slice(firstNewline + 1).trim();
  if (body.endsWith(FENCE)) {
    body = body.slice(0, -FENCE.length).trim();
  }
  return body;
}

export function parseModelReply(raw: string | null | undefined): ParseResult {
  if (!raw || !raw.trim()) {
    return {
      ok: false,
      error: new ScriptGenerationError('Received empty response from dialogue model', 'parse'),
    };
  }

  const payload = stripCodeFence(raw);

  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new ScriptGenerationError(`Failed to parse response as JSON: ${detail}`, 'parse', {
        cause: error,
      }),
    };
  }

  if (!isRecord(decoded)) {
    return {
      ok: false,
      error: new ScriptGenerationError('Response JSON is not an object', 'parse'),
    };
  }

  return { ok: true, value: decoded };
}
