/**
 * Unit Tests for QuizPayloadBuilder
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  QuizPayloadBuilder,
  UNTITLED_QUESTION,
  asQuizDocument,
  enforceQuestionLimit,
  toFormRequests,
} from '../../lib/src/quiz/payload-builder.js';
import { FileArtifactStore, type QuizArtifactStore } from '../../lib/src/quiz/artifact-store.js';
import { recoverJsonObject } from '../../lib/src/quiz/recoverer.js';
import { NO_QUESTIONS_MESSAGE, QuizPayloadError } from '../../lib/src/quiz/types.js';
import { Logger } from '../../lib/src/logging/index.js';

// =============================================================================
// Fixtures
// =============================================================================

function makeQuestion(n: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: `Q${n}`,
    topic: 'Triage',
    difficulty: 'basic',
    stem: `Question ${n}?`,
    options: [
      { label: 'A', text: `A${n}` },
      { label: 'B', text: `B${n}` },
      { label: 'C', text: `C${n}` },
      { label: 'D', text: `D${n}` },
    ],
    answer: { label: 'B', text: `B${n}` },
    rationale: 'Because.',
    operational_note: '',
    safety_flags: [],
    ...overrides,
  };
}

function makeDocument(count: number): { source_summary: string; questions: Record<string, unknown>[] } {
  return {
    source_summary: 'Summary',
    questions: Array.from({ length: count }, (_, i) => makeQuestion(i + 1)),
  };
}

function createFakeStore() {
  const write = vi.fn(async (_path: string, _document: unknown) => undefined);
  const read = vi.fn(async (_path: string): Promise<unknown> => undefined);
  const store: QuizArtifactStore = { write, read };
  return { store, write };
}

const silentLogger = new Logger({ console: false });

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

// =============================================================================
// Pure helpers
// =============================================================================

describe('asQuizDocument', () => {
  it.each([
    ['a sentinel', recoverJsonObject('not json').value],
    ['a non-object', 'text'],
    ['missing questions', { source_summary: 's' }],
    ['a non-array questions field', { questions: 'none' }],
    ['empty questions', { questions: [] }],
  ])('should reject %s with NO_QUESTIONS', (_label, value) => {
    expect(() => asQuizDocument(value)).toThrow(NO_QUESTIONS_MESSAGE);
  });

  it('should keep the other document fields', () => {
    const doc = asQuizDocument(makeDocument(1));
    expect(doc['source_summary']).toBe('Summary');
    expect(doc.questions).toHaveLength(1);
  });
});

describe('enforceQuestionLimit', () => {
  it('should keep the first N questions in order', () => {
    const limited = enforceQuestionLimit(asQuizDocument(makeDocument(9)), 6);

    expect(limited.truncatedFrom).toBe(9);
    expect(limited.document.questions).toEqual(makeDocument(9).questions.slice(0, 6));
  });

  it('should be idempotent', () => {
    const once = enforceQuestionLimit(asQuizDocument(makeDocument(9)), 6);
    const twice = enforceQuestionLimit(once.document, 6);

    expect(twice.document).toBe(once.document);
    expect(twice.truncatedFrom).toBeUndefined();
  });

  it('should leave a short document untouched', () => {
    const doc = asQuizDocument(makeDocument(3));
    expect(enforceQuestionLimit(doc, 6)).toEqual({ document: doc });
  });
});

describe('toFormRequests', () => {
  it('should build a RADIO item and its grading update', () => {
    expect(toFormRequests(makeQuestion(1), 0)).toEqual({
      create: {
        createItem: {
          item: {
            title: 'Question 1?',
            questionItem: {
              question: {
                required: true,
                choiceQuestion: {
                  type: 'RADIO',
                  options: [{ value: 'A1' }, { value: 'B1' }, { value: 'C1' }, { value: 'D1' }],
                  shuffle: false,
                },
              },
            },
          },
          location: { index: 0 },
        },
      },
      grade: {
        updateItem: {
          item: {
            title: 'Question 1?',
            questionItem: {
              question: {
                grading: { pointValue: 1, correctAnswers: { answers: [{ value: 'B1' }] } },
              },
            },
          },
          location: { index: 0 },
          updateMask: 'questionItem.question.grading',
        },
      },
    });
  });

  it('should skip grading when the answer matches no option', () => {
    const pair = toFormRequests(makeQuestion(1, { answer: { label: 'B', text: 'Something else' } }), 2);

    expect(pair.grade).toBeUndefined();
    expect(pair.create.createItem?.location).toEqual({ index: 2 });
  });

  it('should skip grading when the answer matches two options', () => {
    const question = makeQuestion(1, {
      options: [
        { label: 'A', text: 'Same' },
        { label: 'B', text: 'Same' },
      ],
      answer: { label: 'A', text: 'Same' },
    });

    expect(toFormRequests(question, 0).grade).toBeUndefined();
  });

  it('should skip grading for an empty answer', () => {
    const question = makeQuestion(1, { answer: { label: 'A', text: '' } });
    expect(toFormRequests(question, 0).grade).toBeUndefined();
  });

  it('should default a missing stem and drop options without text', () => {
    const question = makeQuestion(1, {
      stem: undefined,
      options: [{ label: 'A', text: 'Keep' }, { label: 'B' }, 'loose', { label: 'C', text: '' }],
      answer: { label: 'A', text: 'Keep' },
    });

    const pair = toFormRequests(question, 0);

    expect(pair.create.createItem?.item?.title).toBe(UNTITLED_QUESTION);
    expect(pair.create.createItem?.item?.questionItem?.question?.choiceQuestion?.options).toEqual([
      { value: 'Keep' },
    ]);
    expect(pair.grade).toBeDefined();
  });
});

// =============================================================================
// Builder
// =============================================================================

describe('QuizPayloadBuilder', () => {
  it('should emit create and grade requests for every question', async () => {
    const { store, write } = createFakeStore();
    const builder = new QuizPayloadBuilder({ store, logger: silentLogger });

    const payload = await builder.build(makeDocument(6), 6, '/runs/mcqs.json');

    expect(payload.pairs).toHaveLength(6);
    expect(payload.requests).toHaveLength(12);
    expect(payload.requests[0]).toBe(payload.pairs[0]?.create);
    expect(payload.requests[1]).toBe(payload.pairs[0]?.grade);
    expect(payload.summary).toEqual({ total: 6, processed: 6, skippedForGrading: 0, truncatedFrom: undefined });
    expect(payload.warnings).toEqual([]);
    expect(write).not.toHaveBeenCalled();
  });

  it('should place items in question order', async () => {
    const { store } = createFakeStore();
    const payload = await new QuizPayloadBuilder({ store, logger: silentLogger }).build(
      makeDocument(3),
      3,
      '/runs/mcqs.json'
    );

    expect(payload.pairs.map((p) => p.create.createItem?.location?.index)).toEqual([0, 1, 2]);
  });

  it('should truncate to the requested count and persist the result', async () => {
    const { store, write } = createFakeStore();
    const builder = new QuizPayloadBuilder({ store, logger: silentLogger });

    const payload = await builder.build(makeDocument(9), 6, '/runs/mcqs.json');

    expect(payload.document.questions).toHaveLength(6);
    expect(payload.summary.truncatedFrom).toBe(9);
    expect(payload.summary.total).toBe(6);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('/runs/mcqs.json', payload.document);
  });

  it('should warn about a shortfall', async () => {
    const { store } = createFakeStore();
    const payload = await new QuizPayloadBuilder({ store, logger: silentLogger }).build(
      makeDocument(4),
      6,
      '/runs/mcqs.json'
    );

    expect(payload.pairs).toHaveLength(4);
    expect(payload.warnings).toEqual([
      { code: 'QUESTION_SHORTFALL', message: 'Requested 6 questions but received 4' },
    ]);
  });

  it('should reject a shortfall below minAcceptableQuestions', async () => {
    const { store } = createFakeStore();
    const builder = new QuizPayloadBuilder({ store, logger: silentLogger, minAcceptableQuestions: 5 });

    const error = await captureError(builder.build(makeDocument(4), 6, '/runs/mcqs.json'));

    expect(error).toBeInstanceOf(QuizPayloadError);
    expect(error).toMatchObject({
      code: 'INSUFFICIENT_QUESTIONS',
      message: 'Only 4 usable questions generated; at least 5 required',
    });
  });

  it('should count questions whose answer cannot be graded', async () => {
    const { store } = createFakeStore();
    const doc = makeDocument(2);
    const questions = [makeQuestion(1), makeQuestion(2, { answer: { label: 'E', text: 'Missing' } })];

    const payload = await new QuizPayloadBuilder({ store, logger: silentLogger }).build(
      { ...doc, questions },
      2,
      '/runs/mcqs.json'
    );

    expect(payload.requests).toHaveLength(3);
    expect(payload.summary.skippedForGrading).toBe(1);
    expect(payload.warnings).toEqual([
      {
        code: 'GRADING_SKIPPED',
        message: 'Correct answer not found among options for question 2; grading skipped',
        index: 1,
      },
    ]);
  });

  it('should skip entries that are not objects', async () => {
    const { store } = createFakeStore();

    const payload = await new QuizPayloadBuilder({ store, logger: silentLogger }).build(
      { questions: ['oops', makeQuestion(2)] },
      2,
      '/runs/mcqs.json'
    );

    expect(payload.pairs).toHaveLength(1);
    expect(payload.pairs[0]?.create.createItem?.location).toEqual({ index: 0 });
    expect(payload.summary).toMatchObject({ total: 2, processed: 1 });
    expect(payload.warnings[0]).toEqual({
      code: 'MALFORMED_QUESTION',
      message: 'Question 1 is not an object; skipped',
      index: 0,
    });
  });

  it('should fail with NO_QUESTIONS when every entry is malformed', async () => {
    const { store } = createFakeStore();

    const error = await captureError(
      new QuizPayloadBuilder({ store, logger: silentLogger }).build({ questions: [1, 2] }, 2, '/runs/mcqs.json')
    );

    expect(error).toMatchObject({ code: 'NO_QUESTIONS', message: NO_QUESTIONS_MESSAGE });
  });

  it('should fail with NO_QUESTIONS for a recovery sentinel', async () => {
    const { store, write } = createFakeStore();

    const error = await captureError(
      new QuizPayloadBuilder({ store, logger: silentLogger }).build(
        recoverJsonObject('no json').value,
        6,
        '/runs/mcqs.json'
      )
    );

    expect(error).toMatchObject({ code: 'NO_QUESTIONS' });
    expect(write).not.toHaveBeenCalled();
  });

  describe('with a file store', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'payload-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should overwrite the artifact with the truncated document', async () => {
      const path = join(dir, 'mcqs.json');
      const store = new FileArtifactStore();
      await store.write(path, makeDocument(9));

      await new QuizPayloadBuilder({ store, logger: silentLogger }).build(makeDocument(9), 6, path);

      const saved: unknown = JSON.parse(await readFile(path, 'utf-8'));
      expect(saved).toEqual(makeDocument(6));
    });
  });
});
