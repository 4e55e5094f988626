/**
 * Unit Tests for the pipeline endpoint
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Services } from '../../api/_lib/services.js';
import type { PipelineErrorCode } from '../../lib/src/index.js';
import handler, {
  formatPipelineResponse,
  removeUpload,
  statusForPipelineError,
} from '../../api/pipeline.js';
import { LogLevel, Logger } from '../../lib/src/logging/index.js';
import { FakeResponse, createPipelineSuccess, createRequest, createTestServices } from './fakes.js';

const holder = vi.hoisted(() => {
  const value: { services: Services | null } = { services: null };
  return value;
});

vi.mock('../../api/_lib/services.js', () => ({
  getServicesOrRespond: () => holder.services,
}));

describe('statusForPipelineError', () => {
  const cases: Array<[PipelineErrorCode, number]> = [
    ['INVALID_INPUT', 400],
    ['NO_QUESTIONS', 400],
    ['INSUFFICIENT_QUESTIONS', 400],
    ['EXTRACTION_FAILED', 422],
    ['GENERATION_FAILED', 502],
    ['ARTIFACT_WRITE_FAILED', 500],
    ['INTERNAL_ERROR', 500],
  ];

  it.each(cases)('should map %s to %i', (code, status) => {
    expect(statusForPipelineError(code)).toBe(status);
  });
});

describe('removeUpload', () => {
  it('should log a warning instead of rejecting when removal fails', async () => {
    const lines: string[] = [];
    const logger = new Logger({
      format: 'json',
      level: LogLevel.TRACE,
      output: (formatted) => {
        lines.push(formatted);
      },
    });
    const remove = vi.fn<(path: string) => Promise<void>>(async () => {
      throw new Error('EBUSY: resource busy');
    });

    await expect(removeUpload('/tmp/upload_1', logger, remove)).resolves.toBeUndefined();

    expect(remove).toHaveBeenCalledWith('/tmp/upload_1');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'WARN',
      message: 'Failed to remove uploaded file',
      context: { path: '/tmp/upload_1', error: 'EBUSY: resource busy' },
    });
  });

  it('should remove an existing file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'upload-test-'));
    const path = join(dir, 'upload.pdf');
    await writeFile(path, 'x');

    await removeUpload(path, new Logger({ console: false }));

    expect(existsSync(path)).toBe(false);
    await rm(dir, { recursive: true, force: true });
  });
});

describe('formatPipelineResponse', () => {
  it('should use the snake_case response fields', () => {
    const result = createPipelineSuccess({
      sharedWith: 'owner@example.com',
      shareError: 'forbidden',
      warnings: [{ code: 'SHARE_FAILED', message: 'Failed to share form with owner@example.com: forbidden' }],
    });

    expect(formatPipelineResponse(result)).toEqual({
      success: true,
      mcqs_json_path: '/tmp/quizrun_abc/mcqs.json',
      form_edit_url: 'https://docs.google.com/forms/d/form-1/edit',
      responder_url: 'https://docs.google.com/forms/d/e/form-1/viewform',
      pdf_filename: 'handbook.pdf',
      num_questions: 6,
      language: 'en',
      model: 'gpt-4.1',
      shared_with: 'owner@example.com',
      share_success: false,
      drive_share_error: 'forbidden',
      warnings: [{ code: 'SHARE_FAILED', message: 'Failed to share form with owner@example.com: forbidden' }],
      summary: { total: 6, processed: 6, skippedForGrading: 0 },
    });
  });
});

describe('/api/pipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-api-'));
  });

  afterEach(async () => {
    holder.services = null;
    await rm(dir, { recursive: true, force: true });
  });

  it('should reject methods other than POST', async () => {
    const { services, run } = createTestServices(dir);
    holder.services = services;
    const res = new FakeResponse();

    await handler(createRequest({ method: 'GET' }), res.asVercel());

    expect(res.statusCode).toBe(405);
    expect(res.body).toMatchObject({ error: { message: 'Method not allowed', code: 'METHOD_NOT_ALLOWED' } });
    expect(run).not.toHaveBeenCalled();
  });

  it('should answer a preflight', async () => {
    holder.services = createTestServices(dir, { ALLOWED_ORIGINS: 'https://app.example.com' }).services;
    const res = new FakeResponse();

    await handler(
      createRequest({ method: 'OPTIONS', headers: { origin: 'https://app.example.com' } }),
      res.asVercel()
    );

    expect(res.ended).toBe(true);
    expect(res.headers['Access-Control-Allow-Methods']).toBe('POST, OPTIONS');
  });

  it('should do nothing more when services are unavailable', async () => {
    const res = new FakeResponse();

    await handler(createRequest({ method: 'POST' }), res.asVercel());

    expect(res.body).toBeUndefined();
  });
});
