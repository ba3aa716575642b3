/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { NO_AUTH_MODE, defaultJwtMode } from '@/modules/auth/index.js';

import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  describe('GET /health/live', () => {
    beforeEach(async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: { mode: defaultJwtMode('test-secret') },
      });
    });

    it('returns 200 without credentials', async () => {
      const response = await app?.inject({ method: 'GET', url: '/health/live' });

      expect(response?.statusCode).toBe(200);
      expect(response?.json()).toEqual({ status: 'ok' });
    });
  });

  describe('unknown routes', () => {
    it('returns 404 with the route in the message', async () => {
      app = await createApp({ fastifyOptions: { logger: false }, deps: { mode: NO_AUTH_MODE } });

      const response = await app.inject({ method: 'GET', url: '/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: 'NotFoundError',
        message: 'Route GET /missing not found',
      });
    });
  });
});
