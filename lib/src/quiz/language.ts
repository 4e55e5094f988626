/**
 * Language and question-count normalization. Both are total: any input maps
 * to a valid value.
 */

import { type QuizLanguage } from './types.js';

export const DEFAULT_NUM_QUESTIONS = 6;
export const MIN_NUM_QUESTIONS = 1;
export const MAX_NUM_QUESTIONS = 20;

const HEBREW_ALIASES: ReadonlySet<string> = new Set(['he', 'hebrew', 'iw', 'he-il']);
const ENGLISH_ALIASES: ReadonlySet<string> = new Set(['en', 'english', 'en-us', 'en-gb']);

export function normalizeLanguage(raw: unknown): QuizLanguage {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  return HEBREW_ALIASES.has(value) ? 'he' : 'en';
}

/**
 * Like {@link normalizeLanguage}, but undefined for words that name no
 * known language.
 */
export function parseLanguageToken(token: string): QuizLanguage | undefined {
  const value = token.trim().toLowerCase();
  if (HEBREW_ALIASES.has(value)) {
    return 'he';
  }
  return ENGLISH_ALIASES.has(value) ? 'en' : undefined;
}

/**
 * Parses an integer (truncating toward zero) and clamps it to
 * [{@link MIN_NUM_QUESTIONS}, {@link MAX_NUM_QUESTIONS}]. Anything that is
 * not a number falls back to the default.
 */
export function clampNumQuestions(
  raw: unknown,
  defaultValue: number = DEFAULT_NUM_QUESTIONS,
  low: number = MIN_NUM_QUESTIONS,
  high: number = MAX_NUM_QUESTIONS
): number {
  let n: number;

  if (typeof raw === 'number') {
    n = Math.trunc(raw);
  } else if (typeof raw === 'string' && /^\s*[+-]?(\d+(\.\d*)?|\.\d+)\s*$/.test(raw)) {
    n = Math.trunc(Number(raw));
  } else {
    n = defaultValue;
  }

  if (!Number.isFinite(n)) {
    n = defaultValue;
  }

  return Math.max(low, Math.min(high, n));
}
