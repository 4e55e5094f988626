/**
 * Health Check Endpoint
 *
 * GET /api/health
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';

export const SERVICE_NAME = 'PDF to Google Form Pipeline';

export default function handler(_req: VercelRequest, res: VercelResponse): void {
  res.status(200).json({ status: 'healthy', service: SERVICE_NAME });
}
