/**
 * Shared HTTP helpers for the API handlers: CORS, request ids and the error
 * body shape.
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { z } from 'zod';

export interface ValidationError {
  /** Path to the field that failed validation */
  field: string;
  message: string;
  /** Error code for programmatic handling */
  code: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    requestId?: string;
    validationErrors?: ValidationError[];
  };
}

/**
 * Generate a unique request ID for tracking
 */
export function generateRequestId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function transformZodErrors(zodError: z.ZodError): ValidationError[] {
  return zodError.errors.map((err) => ({
    field: err.path.join('.') || 'body',
    message: err.message,
    code: `validation_${err.code}`,
  }));
}

export function createErrorResponse(
  res: VercelResponse,
  statusCode: number,
  message: string,
  code?: string,
  options?: {
    requestId?: string;
    validationErrors?: ValidationError[];
  }
): void {
  const response: ErrorResponse = {
    error: {
      message,
      code: code ?? 'UNKNOWN_ERROR',
      ...(options?.requestId && { requestId: options.requestId }),
      ...(options?.validationErrors && { validationErrors: options.validationErrors }),
    },
  };

  res.status(statusCode).json(response);
}

/**
 * Allowed origin for the request, or null when it is not listed.
 * There is no wildcard: an empty list rejects every cross-origin request.
 */
export function getAllowedOrigin(
  origin: string | undefined,
  allowedOrigins: readonly string[]
): string | null {
  if (origin && allowedOrigins.includes(origin)) {
    return origin;
  }
  return null;
}

/**
 * Sets CORS headers and answers preflight requests.
 *
 * @returns true when the request was a preflight and has been answered
 */
export function handleCors(
  req: VercelRequest,
  res: VercelResponse,
  methods: string,
  allowedOrigins: readonly string[],
  headers = 'Content-Type'
): boolean {
  const allowedOrigin = getAllowedOrigin(req.headers.origin, allowedOrigins);

  if (allowedOrigin) {
    res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
    res.setHeader('Access-Control-Allow-Methods', `${methods}, OPTIONS`);
    res.setHeader('Access-Control-Allow-Headers', headers);
    res.setHeader('Vary', 'Origin');
  }

  if (req.method === 'OPTIONS') {
    res.status(200).end();
    return true;
  }
  return false;
}

/**
 * First value of a query parameter or form field that may arrive as an array.
 */
export function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
