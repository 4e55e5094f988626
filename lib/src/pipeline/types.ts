/**
 * Pipeline Types
 *
 * Input, result and error shapes for one PDF → quiz → form run.
 */

import type { QuizLanguage, QuizPayloadSummary } from '../quiz/index.js';
import type { CompletionStrategyName } from '../llm/index.js';

// =============================================================================
// Codes
// =============================================================================

export const PipelineErrorCode = {
  INVALID_INPUT: 'INVALID_INPUT',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
  GENERATION_FAILED: 'GENERATION_FAILED',
  NO_QUESTIONS: 'NO_QUESTIONS',
  INSUFFICIENT_QUESTIONS: 'INSUFFICIENT_QUESTIONS',
  ARTIFACT_WRITE_FAILED: 'ARTIFACT_WRITE_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

/**
 * Stage a failed run stopped in. Publishing and sharing only degrade a run.
 */
export const PipelineStage = {
  INPUT: 'input',
  EXTRACTION: 'extraction',
  COMPLETION: 'completion',
  ARTIFACT: 'artifact',
  PAYLOAD: 'payload',
} as const;

export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

/**
 * Degraded outcomes reported on a successful run.
 */
export const PipelineWarningCode = {
  QUESTION_SHORTFALL: 'QUESTION_SHORTFALL',
  MALFORMED_QUESTION: 'MALFORMED_QUESTION',
  GRADING_SKIPPED: 'GRADING_SKIPPED',
  PAGES_UNREADABLE: 'PAGES_UNREADABLE',
  QUIZ_MODE_FAILED: 'QUIZ_MODE_FAILED',
  FORM_CREATION_FAILED: 'FORM_CREATION_FAILED',
  SHARE_FAILED: 'SHARE_FAILED',
} as const;

export type PipelineWarningCode = (typeof PipelineWarningCode)[keyof typeof PipelineWarningCode];

export interface PipelineWarning {
  code: PipelineWarningCode;
  message: string;
}

// =============================================================================
// Input
// =============================================================================

/**
 * One run's request. Exactly one of `pdfPath` or `pdfBuffer` is given; a
 * buffer is written into the run directory and removed when the run ends,
 * while a path stays owned by the caller.
 *
 * Count and language are taken as they arrive (form fields, message tokens)
 * and normalized by the orchestrator.
 */
export interface PipelineInput {
  pdfPath?: string | undefined;
  pdfBuffer?: Buffer | undefined;
  /** Original file name of an uploaded buffer */
  filename?: string | undefined;
  numQuestions?: unknown;
  language?: unknown;
  model?: string | undefined;
  /** Drive recipient; falls back to the configured default */
  shareWith?: string | undefined;
}

// =============================================================================
// Result
// =============================================================================

export interface PipelineSuccess {
  ok: true;
  runId: string;
  artifactPath: string;
  formId: string | null;
  formEditUrl: string | null;
  responderUrl: string | null;
  pdfFilename: string;
  numQuestions: number;
  language: QuizLanguage;
  model: string;
  strategy: CompletionStrategyName;
  summary: QuizPayloadSummary;
  sharedWith: string | null;
  shareSuccess: boolean;
  shareError: string | null;
  warnings: PipelineWarning[];
}

export interface PipelineFailureDetail {
  code: PipelineErrorCode;
  stage: PipelineStage;
  message: string;
}

export interface PipelineFailure {
  ok: false;
  runId: string;
  error: PipelineFailureDetail;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

// =============================================================================
// Errors
// =============================================================================

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage: PipelineStage;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PipelineErrorCode,
    stage: PipelineStage,
    options?: { cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }

  toDetail(): PipelineFailureDetail {
    return { code: this.code, stage: this.stage, message: this.message };
  }
}
