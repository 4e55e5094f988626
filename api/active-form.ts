/**
 * Active Form API Endpoint
 *
 * GET  /api/active-form[?view=responses] → 302 to the active quiz (or its responses)
 * POST /api/active-form { active_form_url, active_responses_url? } → sets the active quiz
 *
 * POST requires `Authorization: Bearer <ADMIN_TOKEN>` when ADMIN_TOKEN is set.
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';

import { deriveResponsesUrl } from '../lib/src/index.js';
import {
  createErrorResponse,
  firstValue,
  generateRequestId,
  handleCors,
  transformZodErrors,
} from './_lib/http.js';
import { getServicesOrRespond } from './_lib/services.js';

const UpdateActiveFormSchema = z.object({
  active_form_url: z
    .string({ required_error: 'active_form_url is required' })
    .url('active_form_url must be a URL'),
  active_responses_url: z.string().url('active_responses_url must be a URL').optional(),
});

export type UpdateActiveFormRequest = z.infer<typeof UpdateActiveFormSchema>;

export function isAuthorized(authorization: string | undefined, adminToken: string | undefined): boolean {
  if (adminToken === undefined) {
    return true;
  }
  return authorization === `Bearer ${adminToken}`;
}

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  const requestId = generateRequestId('active-form');
  const services = getServicesOrRespond(res, requestId);
  if (!services) {
    return;
  }
  const { config, logger, pointer } = services;

  if (handleCors(req, res, 'GET, POST', config.allowedOrigins, 'Content-Type, Authorization')) {
    return;
  }

  try {
    if (req.method === 'GET') {
      const view = firstValue(req.query['view']) === 'responses' ? 'responses' : 'form';
      const target = await pointer.resolveRedirect(view);
      if (target === null) {
        createErrorResponse(res, 404, 'No active form is set', 'NOT_FOUND', { requestId });
        return;
      }
      res.redirect(302, target);
      return;
    }

    if (req.method === 'POST') {
      if (!isAuthorized(req.headers.authorization, config.adminToken)) {
        createErrorResponse(res, 401, 'Unauthorized', 'UNAUTHORIZED', { requestId });
        return;
      }

      const parsed = UpdateActiveFormSchema.safeParse(req.body);
      if (!parsed.success) {
        const validationErrors = transformZodErrors(parsed.error);
        createErrorResponse(
          res,
          400,
          validationErrors[0]?.message ?? 'Invalid request body',
          'VALIDATION_ERROR',
          { requestId, validationErrors }
        );
        return;
      }

      const formUrl = parsed.data.active_form_url;
      const updated = {
        active_form_url: formUrl,
        active_responses_url: parsed.data.active_responses_url ?? deriveResponsesUrl(formUrl),
      };
      await pointer.write(updated);
      res.status(200).json({ success: true, ...updated });
      return;
    }

    createErrorResponse(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED', { requestId });
  } catch (error) {
    logger.error('Active form API error', error, { requestId });
    createErrorResponse(res, 500, 'An unexpected error occurred', 'INTERNAL_ERROR', { requestId });
  }
}
