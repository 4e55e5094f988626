/**
 * Request/response stand-ins for the API handler tests.
 */

import { vi } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';

import type { Services } from '../../api/_lib/services.js';
import type { PipelineSuccess } from '../../lib/src/index.js';
import { ActiveFormPointer, Logger, loadAppConfig } from '../../lib/src/index.js';

export class FakeResponse {
  statusCode = 200;
  body: unknown = undefined;
  headers: Record<string, string> = {};
  redirectedTo: string | undefined;
  ended = false;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  redirect(status: number, url: string): this {
    this.statusCode = status;
    this.redirectedTo = url;
    return this;
  }

  end(): this {
    this.ended = true;
    return this;
  }

  asVercel(): VercelResponse {
    return this as unknown as VercelResponse;
  }
}

export function createRequest(fields: {
  method: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
}): VercelRequest {
  return {
    method: fields.method,
    headers: fields.headers ?? {},
    query: fields.query ?? {},
    body: fields.body,
  } as unknown as VercelRequest;
}

export function createTestServices(workDir: string, env: NodeJS.ProcessEnv = {}) {
  const config = loadAppConfig({
    WORK_DIR: workDir,
    ACTIVE_FORM_PATH: `${workDir}/active_form.json`,
    ...env,
  });
  const logger = new Logger({ console: false });
  const run = vi.fn<Services['orchestrator']['run']>();
  const sendMessage = vi.fn(async () => ({ sid: 'SM123' }));

  const services: Services = {
    config,
    logger,
    orchestrator: { run },
    pointer: new ActiveFormPointer(config.activeFormPath, { logger }),
    messaging: config.twilio ? { sendMessage } : null,
  };
  return { services, run, sendMessage };
}

export function createPipelineSuccess(overrides: Partial<PipelineSuccess> = {}): PipelineSuccess {
  return {
    ok: true,
    runId: 'run-1',
    artifactPath: '/tmp/quizrun_abc/mcqs.json',
    formId: 'form-1',
    formEditUrl: 'https://docs.google.com/forms/d/form-1/edit',
    responderUrl: 'https://docs.google.com/forms/d/e/form-1/viewform',
    pdfFilename: 'handbook.pdf',
    numQuestions: 6,
    language: 'en',
    model: 'gpt-4.1',
    strategy: 'responses_json',
    summary: { total: 6, processed: 6, skippedForGrading: 0 },
    sharedWith: null,
    shareSuccess: false,
    shareError: null,
    warnings: [],
    ...overrides,
  };
}
