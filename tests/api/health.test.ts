/**
 * Unit Tests for the health endpoints
 */

import { describe, it, expect } from 'vitest';
import healthHandler, { SERVICE_NAME } from '../../api/health.js';
import healthzHandler from '../../api/healthz.js';
import { FakeResponse, createRequest } from './fakes.js';

describe('GET /api/health', () => {
  it('should report the service as healthy', () => {
    const res = new FakeResponse();

    healthHandler(createRequest({ method: 'GET' }), res.asVercel());

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ status: 'healthy', service: 'PDF to Google Form Pipeline' });
    expect(SERVICE_NAME).toBe('PDF to Google Form Pipeline');
  });
});

describe('GET /api/healthz', () => {
  it('should answer ok', () => {
    const res = new FakeResponse();

    healthzHandler(createRequest({ method: 'GET' }), res.asVercel());

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});
