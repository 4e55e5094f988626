/**
 * Quiz Payload Builder
 *
 * Turns the recovered model output into Google Forms batchUpdate requests:
 * enforces the requested question count, persists a truncated document,
 * and attaches an answer key only where the answer is unambiguous.
 */

import {
  type FormRequest,
  type FormRequestPair,
  type LooseQuizDocument,
  type QuizPayload,
  type QuizWarning,
  NO_QUESTIONS_MESSAGE,
  QuizPayloadError,
  QuizPayloadErrorCode,
  QuizWarningCode,
} from './types.js';
import { type QuizArtifactStore } from './artifact-store.js';
import { isRecoverySentinel } from './recoverer.js';
import { type Logger, createLogger } from '../logging/index.js';

export const UNTITLED_QUESTION = 'Untitled question';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows recovered output to a document with a non-empty `questions` array.
 *
 * @throws {QuizPayloadError} NO_QUESTIONS for a sentinel, a non-object, or
 * missing/empty questions
 */
export function asQuizDocument(value: unknown): LooseQuizDocument {
  if (!isRecord(value) || isRecoverySentinel(value)) {
    throw new QuizPayloadError(NO_QUESTIONS_MESSAGE, QuizPayloadErrorCode.NO_QUESTIONS);
  }

  const questions = value['questions'];
  if (!Array.isArray(questions) || questions.length === 0) {
    throw new QuizPayloadError(NO_QUESTIONS_MESSAGE, QuizPayloadErrorCode.NO_QUESTIONS);
  }

  return { ...value, questions };
}

/**
 * Keeps the first `requested` questions. Idempotent: a document already
 * within the limit comes back as the same object with no `truncatedFrom`.
 */
export function enforceQuestionLimit(
  document: LooseQuizDocument,
  requested: number
): { document: LooseQuizDocument; truncatedFrom?: number | undefined } {
  if (document.questions.length <= requested) {
    return { document };
  }

  return {
    document: { ...document, questions: document.questions.slice(0, requested) },
    truncatedFrom: document.questions.length,
  };
}

function readStem(question: Record<string, unknown>): string {
  const stem = question['stem'];
  return typeof stem === 'string' && stem.trim().length > 0 ? stem : UNTITLED_QUESTION;
}

function readOptionTexts(question: Record<string, unknown>): string[] {
  const options = question['options'];
  if (!Array.isArray(options)) {
    return [];
  }

  const texts: string[] = [];
  for (const option of options) {
    const text = isRecord(option) ? option['text'] : undefined;
    if (typeof text === 'string' && text.length > 0) {
      texts.push(text);
    }
  }
  return texts;
}

function readAnswerText(question: Record<string, unknown>): string {
  const answer = question['answer'];
  const text = isRecord(answer) ? answer['text'] : undefined;
  return typeof text === 'string' ? text : '';
}

/**
 * Builds the createItem request, and the grading updateItem when the answer
 * text equals exactly one option.
 */
export function toFormRequests(
  question: Record<string, unknown>,
  index: number
): FormRequestPair {
  const title = readStem(question);
  const optionTexts = readOptionTexts(question);
  const answerText = readAnswerText(question);

  const create: FormRequest = {
    createItem: {
      item: {
        title,
        questionItem: {
          question: {
            required: true,
            choiceQuestion: {
              type: 'RADIO',
              options: optionTexts.map((value) => ({ value })),
              shuffle: false,
            },
          },
        },
      },
      location: { index },
    },
  };

  const matches = optionTexts.filter((text) => text === answerText).length;
  if (answerText.length === 0 || matches !== 1) {
    return { create };
  }

  const grade: FormRequest = {
    updateItem: {
      item: {
        title,
        questionItem: {
          question: {
            grading: {
              pointValue: 1,
              correctAnswers: { answers: [{ value: answerText }] },
            },
          },
        },
      },
      location: { index },
      updateMask: 'questionItem.question.grading',
    },
  };

  return { create, grade };
}

export interface QuizPayloadBuilderDependencies {
  store: QuizArtifactStore;
  logger?: Logger | undefined;
  /**
   * Fewest usable questions accepted. Zero is always fatal.
   * @default 1
   */
  minAcceptableQuestions?: number | undefined;
}

export class QuizPayloadBuilder {
  private readonly store: QuizArtifactStore;
  private readonly logger: Logger;
  private readonly minAcceptableQuestions: number;

  constructor(dependencies: QuizPayloadBuilderDependencies) {
    this.store = dependencies.store;
    this.logger = dependencies.logger ?? createLogger('quiz');
    this.minAcceptableQuestions = Math.max(1, dependencies.minAcceptableQuestions ?? 1);
  }

  /**
   * @param parsed - Recoverer output (object or sentinel)
   * @param requested - Question count asked of the model
   * @param artifactPath - Where a truncated document is persisted
   * @throws {QuizPayloadError} NO_QUESTIONS, INSUFFICIENT_QUESTIONS or ARTIFACT_WRITE_FAILED
   */
  async build(parsed: unknown, requested: number, artifactPath: string): Promise<QuizPayload> {
    const warnings: QuizWarning[] = [];
    const limited = enforceQuestionLimit(asQuizDocument(parsed), requested);
    const document = limited.document;

    if (limited.truncatedFrom !== undefined) {
      this.logger.info('Truncating questions to requested count', {
        received: limited.truncatedFrom,
        requested,
      });
      await this.store.write(artifactPath, document);
    } else if (document.questions.length < requested) {
      warnings.push({
        code: QuizWarningCode.QUESTION_SHORTFALL,
        message: `Requested ${requested} questions but received ${document.questions.length}`,
      });
    }

    const pairs: FormRequestPair[] = [];
    let skippedForGrading = 0;

    document.questions.forEach((question, index) => {
      if (!isRecord(question)) {
        warnings.push({
          code: QuizWarningCode.MALFORMED_QUESTION,
          message: `Question ${index + 1} is not an object; skipped`,
          index,
        });
        return;
      }

      // Location follows the request order so the form keeps the question order
      const pair = toFormRequests(question, pairs.length);
      if (pair.grade === undefined) {
        skippedForGrading++;
        warnings.push({
          code: QuizWarningCode.GRADING_SKIPPED,
          message: `Correct answer not found among options for question ${index + 1}; grading skipped`,
          index,
        });
      }
      pairs.push(pair);
    });

    if (pairs.length === 0) {
      throw new QuizPayloadError(NO_QUESTIONS_MESSAGE, QuizPayloadErrorCode.NO_QUESTIONS);
    }

    if (pairs.length < this.minAcceptableQuestions) {
      throw new QuizPayloadError(
        `Only ${pairs.length} usable questions generated; at least ${this.minAcceptableQuestions} required`,
        QuizPayloadErrorCode.INSUFFICIENT_QUESTIONS
      );
    }

    for (const warning of warnings) {
      this.logger.warn(warning.message, { code: warning.code });
    }

    const requests = pairs.flatMap((pair) => (pair.grade ? [pair.create, pair.grade] : [pair.create]));

    return {
      document,
      pairs,
      requests,
      summary: {
        total: document.questions.length,
        processed: pairs.length,
        skippedForGrading,
        truncatedFrom: limited.truncatedFrom,
      },
      warnings,
    };
  }
}
