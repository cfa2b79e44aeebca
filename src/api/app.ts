/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type { CuriosityEngine } from '@/services/curiosity.service.js';
import { errorMessage } from '@/types/index.js';

import {
  createControlAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createCuriosityRoutes } from './routes/curiosity.js';
import { createHealthRoutes } from './routes/health.js';

/**
 * App configuration
 */
interface AppConfig {
  engine: CuriosityEngine;
  controlToken?: string;
  allowedOrigins?: string[];
  /** Request access log via hono/logger */
  accessLog?: boolean;
  logger?: Logger;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { engine, allowedOrigins } = config;
  const appLogger = config.logger ?? silentLogger;
  const app = new Hono();

  // Global middleware
  if (config.accessLog === true) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route('/api/v1', createHealthRoutes({ engine }));

  // Curiosity control routes
  const controlMiddleware = createControlAuthMiddleware(
    config.controlToken !== undefined ? { token: config.controlToken } : {}
  );
  app.use('/api/v1/curiosity/*', controlMiddleware);
  app.route('/api/v1', createCuriosityRoutes({ engine }));

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    appLogger.error('Unhandled error', { error: errorMessage(err) });
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
