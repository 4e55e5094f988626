/**
 * Quiz Types
 *
 * The quiz document the model is asked to produce, the lenient view the
 * payload builder reads, and the Google Forms request shapes it emits.
 */

import { z } from 'zod';
import type { forms_v1 } from 'googleapis';

// =============================================================================
// Language & Count
// =============================================================================

export const QuizLanguage = {
  ENGLISH: 'en',
  HEBREW: 'he',
} as const;

export type QuizLanguage = (typeof QuizLanguage)[keyof typeof QuizLanguage];

export const QuizLanguageSchema = z.enum(['en', 'he']);

// =============================================================================
// Quiz Document
// =============================================================================

export const OptionLabelSchema = z.enum(['A', 'B', 'C', 'D']);

export const DifficultySchema = z.enum(['basic', 'intermediate', 'advanced']);

export const QuestionOptionSchema = z.object({
  label: OptionLabelSchema,
  text: z.string().min(1),
});

export type QuestionOption = z.infer<typeof QuestionOptionSchema>;

/**
 * A single MCQ in its ideal shape.
 */
export const QuestionSchema = z.object({
  id: z.string().min(1),
  topic: z.string(),
  difficulty: DifficultySchema,
  /** One paragraph, no line breaks */
  stem: z.string().min(1).max(320).regex(/^[^\r\n]*$/),
  options: z.array(QuestionOptionSchema).length(4),
  answer: z.object({
    label: OptionLabelSchema,
    text: z.string().min(1),
  }),
  rationale: z.string().max(300),
  operational_note: z.string().max(200),
  safety_flags: z.array(z.string()),
});

export type Question = z.infer<typeof QuestionSchema>;

export const QuizDocumentSchema = z.object({
  source_summary: z.string().max(400),
  questions: z.array(QuestionSchema),
});

export type QuizDocument = z.infer<typeof QuizDocumentSchema>;

/**
 * The model's output as the payload builder sees it: an object with a
 * `questions` array whose entries are not yet trusted.
 */
export interface LooseQuizDocument {
  [key: string]: unknown;
  questions: unknown[];
}

// =============================================================================
// Recoverer
// =============================================================================

export const RecoveryStrategy = {
  DIRECT: 'direct',
  FENCED: 'fenced',
  BRACES: 'braces',
} as const;

export type RecoveryStrategy = (typeof RecoveryStrategy)[keyof typeof RecoveryStrategy];

/**
 * Returned instead of an exception when no JSON object could be recovered.
 */
export interface RecoverySentinel {
  _raw_text: string;
  _error: 'json_decode_failed';
  _exception: string;
}

export type RecoveryResult =
  | { ok: true; value: Record<string, unknown>; strategy: RecoveryStrategy }
  | { ok: false; value: RecoverySentinel };

// =============================================================================
// Form Requests
// =============================================================================

export type FormRequest = forms_v1.Schema$Request;

/**
 * The createItem request for one question, and its grading update when the
 * answer matches exactly one option.
 */
export interface FormRequestPair {
  create: FormRequest;
  grade?: FormRequest | undefined;
}

export interface QuizPayloadSummary {
  total: number;
  processed: number;
  skippedForGrading: number;
  /** Original count when the document was truncated */
  truncatedFrom?: number | undefined;
}

export const QuizWarningCode = {
  QUESTION_SHORTFALL: 'QUESTION_SHORTFALL',
  MALFORMED_QUESTION: 'MALFORMED_QUESTION',
  GRADING_SKIPPED: 'GRADING_SKIPPED',
} as const;

export type QuizWarningCode = (typeof QuizWarningCode)[keyof typeof QuizWarningCode];

export interface QuizWarning {
  code: QuizWarningCode;
  message: string;
  /** 0-based position of the question concerned */
  index?: number | undefined;
}

export interface QuizPayload {
  document: LooseQuizDocument;
  pairs: FormRequestPair[];
  /** `pairs` flattened in order, ready for a batchUpdate */
  requests: FormRequest[];
  summary: QuizPayloadSummary;
  warnings: QuizWarning[];
}

// =============================================================================
// Error Classes
// =============================================================================

export const QuizPayloadErrorCode = {
  /** Nothing usable came back from the model */
  NO_QUESTIONS: 'NO_QUESTIONS',
  /** Fewer questions than the configured minimum */
  INSUFFICIENT_QUESTIONS: 'INSUFFICIENT_QUESTIONS',
  ARTIFACT_WRITE_FAILED: 'ARTIFACT_WRITE_FAILED',
} as const;

export type QuizPayloadErrorCode = (typeof QuizPayloadErrorCode)[keyof typeof QuizPayloadErrorCode];

export const NO_QUESTIONS_MESSAGE =
  'No questions generated from PDF. Please check the PDF content and try again.';

export class QuizPayloadError extends Error {
  readonly code: QuizPayloadErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: QuizPayloadErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'QuizPayloadError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QuizPayloadError);
    }
  }
}

export function isQuizPayloadError(error: unknown): error is QuizPayloadError {
  return error instanceof QuizPayloadError;
}
