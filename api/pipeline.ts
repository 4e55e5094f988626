/**
 * Pipeline API Endpoint
 *
 * POST /api/pipeline (multipart/form-data)
 * Fields: pdf (file), language?, num_questions?, model?, share_with?
 * Response: { success: true, mcqs_json_path, form_edit_url, ... }
 *
 * Runs the PDF → quiz → Google Form pipeline for one upload.
 */

import { readFile, rm } from 'node:fs/promises';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import formidable from 'formidable';

import {
  type Logger,
  type PipelineErrorCode,
  type PipelineSuccess,
  type PipelineWarning,
  type QuizPayloadSummary,
} from '../lib/src/index.js';
import { createErrorResponse, firstValue, generateRequestId, handleCors } from './_lib/http.js';
import { getServicesOrRespond } from './_lib/services.js';

/** Maximum upload size in bytes */
const MAX_FILE_SIZE = 50 * 1024 * 1024;

export const config = {
  api: { bodyParser: false },
};

export interface PipelineResponse {
  success: true;
  mcqs_json_path: string;
  form_edit_url: string | null;
  responder_url: string | null;
  pdf_filename: string;
  num_questions: number;
  language: string;
  model: string;
  shared_with: string | null;
  share_success: boolean;
  drive_share_error: string | null;
  warnings: PipelineWarning[];
  summary: QuizPayloadSummary;
}

export function statusForPipelineError(code: PipelineErrorCode): number {
  switch (code) {
    case 'INVALID_INPUT':
    case 'NO_QUESTIONS':
    case 'INSUFFICIENT_QUESTIONS':
      return 400;
    case 'EXTRACTION_FAILED':
      return 422;
    case 'GENERATION_FAILED':
      return 502;
    default:
      return 500;
  }
}

export function formatPipelineResponse(result: PipelineSuccess): PipelineResponse {
  return {
    success: true,
    mcqs_json_path: result.artifactPath,
    form_edit_url: result.formEditUrl,
    responder_url: result.responderUrl,
    pdf_filename: result.pdfFilename,
    num_questions: result.numQuestions,
    language: result.language,
    model: result.model,
    shared_with: result.sharedWith,
    share_success: result.shareSuccess,
    drive_share_error: result.shareError,
    warnings: result.warnings,
    summary: result.summary,
  };
}

/**
 * Removes formidable's temp file. Runs after the response is sent, so a
 * failure is only logged.
 */
export async function removeUpload(
  path: string,
  logger: Logger,
  remove: (path: string) => Promise<void> = (target) => rm(target, { force: true })
): Promise<void> {
  try {
    await remove(path);
  } catch (error) {
    logger.warn('Failed to remove uploaded file', {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  const requestId = generateRequestId('pipeline');
  const services = getServicesOrRespond(res, requestId);
  if (!services) {
    return;
  }
  const { config: appConfig, logger, orchestrator } = services;

  if (handleCors(req, res, 'POST', appConfig.allowedOrigins)) {
    return;
  }

  if (req.method !== 'POST') {
    createErrorResponse(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED', { requestId });
    return;
  }

  let uploadPath: string | undefined;

  try {
    const form = formidable({
      maxFiles: 1,
      maxFileSize: MAX_FILE_SIZE,
      allowEmptyFiles: true,
      minFileSize: 0,
    });
    const [fields, files] = await form.parse(req);

    const file = files['pdf']?.[0];
    if (!file) {
      createErrorResponse(res, 400, "Missing file 'pdf'", 'INVALID_INPUT', { requestId });
      return;
    }
    uploadPath = file.filepath;

    if (!file.originalFilename) {
      createErrorResponse(res, 400, 'No file selected', 'INVALID_INPUT', { requestId });
      return;
    }

    const result = await orchestrator.run({
      pdfBuffer: await readFile(file.filepath),
      filename: file.originalFilename,
      language: firstValue(fields['language']),
      numQuestions: firstValue(fields['num_questions']),
      model: firstValue(fields['model']),
      shareWith: firstValue(fields['share_with']),
    });

    if (!result.ok) {
      createErrorResponse(
        res,
        statusForPipelineError(result.error.code),
        result.error.message,
        result.error.code,
        { requestId }
      );
      return;
    }

    res.status(200).json(formatPipelineResponse(result));
  } catch (error) {
    logger.error('Pipeline API error', error, { requestId });
    createErrorResponse(res, 500, 'An unexpected error occurred', 'INTERNAL_ERROR', { requestId });
  } finally {
    if (uploadPath !== undefined) {
      await removeUpload(uploadPath, logger);
    }
  }
}
