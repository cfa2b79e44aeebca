/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { CuriosityEngine } from '@/services/curiosity.service.js';

interface HealthRoutesDeps {
  engine?: Pick<CuriosityEngine, 'queueSize' | 'isBackgroundRunning'>;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps = {}): Hono {
  const { engine } = deps;
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
      ...(engine !== undefined && {
        curiosity: {
          queueSize: engine.queueSize(),
          backgroundRunning: engine.isBackgroundRunning(),
        },
      }),
    });
  });

  return app;
}
