/**
 * Structured-Result Recoverer
 *
 * Pulls a JSON object out of model output that may be wrapped in prose or a
 * markdown fence. Never throws: failure yields a sentinel that keeps the raw
 * text for inspection.
 */

import {
  type RecoveryResult,
  type RecoverySentinel,
  RecoveryStrategy,
} from './types.js';

const FENCED_JSON_PATTERN = /```(?:json)?\s*(\{.*?\})\s*```/s;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type ParseAttempt =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; parsed: boolean; reason: string };

function parseObject(candidate: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(candidate);
    if (isPlainObject(value)) {
      return { ok: true, value };
    }
    return {
      ok: false,
      parsed: true,
      reason: `Expected a JSON object, got ${Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value}`,
    };
  } catch (error) {
    return { ok: false, parsed: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Candidate substrings, in the order they are tried.
 */
function candidates(text: string): Array<{ strategy: RecoveryStrategy; candidate: string }> {
  const result: Array<{ strategy: RecoveryStrategy; candidate: string }> = [
    { strategy: RecoveryStrategy.DIRECT, candidate: text },
  ];

  const fenced = FENCED_JSON_PATTERN.exec(text);
  if (fenced?.[1] !== undefined) {
    result.push({ strategy: RecoveryStrategy.FENCED, candidate: fenced[1] });
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) {
    result.push({ strategy: RecoveryStrategy.BRACES, candidate: text.slice(first, last + 1) });
  }

  return result;
}

/**
 * Recovers a JSON object from raw model text.
 *
 * Tries the whole text, then the first fenced block, then the span from the
 * first `{` to the last `}`. Arrays and primitives do not count as success;
 * text that parses as one whole is not searched any further.
 *
 * @example
 * ```typescript
 * const result = recoverJsonObject('Sure!\n```json\n{"questions": []}\n```');
 * // { ok: true, value: { questions: [] }, strategy: 'fenced' }
 * ```
 */
export function recoverJsonObject(text: string): RecoveryResult {
  let lastReason = 'No JSON object found';

  for (const { strategy, candidate } of candidates(text)) {
    const parsed = parseObject(candidate);
    if (parsed.ok) {
      return { ok: true, value: parsed.value, strategy };
    }
    lastReason = parsed.reason;
    if (parsed.parsed) {
      break;
    }
  }

  const sentinel: RecoverySentinel = {
    _raw_text: text,
    _error: 'json_decode_failed',
    _exception: lastReason,
  };
  return { ok: false, value: sentinel };
}

export function isRecoverySentinel(value: unknown): value is RecoverySentinel {
  return isPlainObject(value) && value['_error'] === 'json_decode_failed';
}
