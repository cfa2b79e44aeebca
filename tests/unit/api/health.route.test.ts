/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, vi } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status ok', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.status).toBe('ok');
    });

    it('should include timestamp in response', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      const body = await res.json();
      expect(typeof body.timestamp).toBe('string');
      // Verify it's a valid ISO date
      expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
    });

    it('should include version info', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      const body = await res.json();
      expect(body.version).toBe('v1');
    });

    it('should omit curiosity details without an engine', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const res = await app.request('/api/v1/health');

      const body = await res.json();
      expect(body.curiosity).toBeUndefined();
    });

    it('should report queue size and worker state', async () => {
      const app = new Hono();
      app.route(
        '/api/v1',
        createHealthRoutes({
          engine: {
            queueSize: vi.fn().mockReturnValue(2),
            isBackgroundRunning: vi.fn().mockReturnValue(true),
          },
        })
      );

      const res = await app.request('/api/v1/health');

      const body = await res.json();
      expect(body.curiosity).toEqual({ queueSize: 2, backgroundRunning: true });
    });
  });
});
