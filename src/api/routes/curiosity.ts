/**
 * Curiosity Routes
 * Control surface for the curiosity engine: submit, drain, status,
 * resurfacing, search and background start/stop
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { CuriosityEngine } from '@/services/curiosity.service.js';
import {
  DEFAULT_RESURFACE_LIMIT,
  DEFAULT_SEARCH_LIMIT,
} from '@/services/curiosity.service.js';
import type { InsightRecord, ResurfacedInsight } from '@/types/index.js';

import { errorResponse, getRequestId, successResponse } from '../utils/response.js';

const MAX_RESURFACE_LIMIT = 20;
const MAX_SEARCH_LIMIT = 50;

/**
 * Tangent submission body. Defaults describe a typical off-topic but
 * interesting tangent.
 */
const queueTangentSchema = z.object({
  tangent: z
    .string({ required_error: 'tangent is required' })
    .trim()
    .min(1, 'tangent cannot be empty'),
  seedQuery: z.string().default(''),
  relevance: z.number().min(0).max(1).default(0.2),
  interest: z.number().min(0).max(1).default(0.8),
});

type CuriosityEngineDep = Pick<
  CuriosityEngine,
  | 'queueTangent'
  | 'drain'
  | 'status'
  | 'resurfaceCuriosities'
  | 'searchInsights'
  | 'startBackground'
  | 'stopBackground'
  | 'isBackgroundRunning'
  | 'queueSize'
>;

interface CuriosityRoutesDeps {
  engine: CuriosityEngineDep;
}

/**
 * Parse limit query param
 */
function parseLimit(
  value: string | undefined,
  fallback: number,
  max: number
): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return fallback;
  }
  return Math.min(parsed, max);
}

function formatResurfaced(item: ResurfacedInsight): {
  tangent: string;
  originalContext: string;
  insight: string;
  timestamp: string;
  qualityScore: number;
} {
  return {
    tangent: item.tangent,
    originalContext: item.originalContext,
    insight: item.insight,
    timestamp: item.timestamp.toISOString(),
    qualityScore: item.qualityScore,
  };
}

function formatInsight(record: InsightRecord): {
  id: string;
  origin: string;
  seedQuery: string;
  tangent: string;
  insight: string;
  qualityScore: number;
  createdAt: string;
} {
  return {
    id: record.id,
    origin: record.origin,
    seedQuery: record.seedQuery,
    tangent: record.tangent,
    insight: record.insight,
    qualityScore: record.qualityScore,
    createdAt: record.createdAt.toISOString(),
  };
}

/**
 * Create curiosity routes
 */
export function createCuriosityRoutes(deps: CuriosityRoutesDeps): Hono {
  const { engine } = deps;
  const app = new Hono();

  /**
   * POST /curiosity/tangents
   * Submit a tangent; 201 when queued, 200 when filtered out
   */
  app.post('/curiosity/tangents', async (c) => {
    const requestId = getRequestId(c);

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = queueTangentSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid tangent',
        },
        requestId
      );
    }

    const body = validation.data;
    const queued = engine.queueTangent({
      text: body.tangent,
      seedQuery: body.seedQuery,
      relevance: body.relevance,
      interest: body.interest,
    });

    return successResponse(
      c,
      { tangent: body.tangent, queued, queueSize: engine.queueSize() },
      requestId,
      queued ? 201 : 200
    );
  });

  /**
   * POST /curiosity/drain
   * Process up to maxPerCycle tangents now
   */
  app.post('/curiosity/drain', async (c) => {
    const requestId = getRequestId(c);
    const report = await engine.drain();

    return successResponse(
      c,
      { ...report, queueRemaining: engine.queueSize() },
      requestId
    );
  });

  /**
   * GET /curiosity/status
   */
  app.get('/curiosity/status', async (c) => {
    const requestId = getRequestId(c);
    const status = await engine.status();

    return successResponse(
      c,
      {
        ...status,
        insights: {
          ...status.insights,
          lastCuriosity: status.insights.lastCuriosity?.toISOString() ?? null,
        },
      },
      requestId
    );
  });

  /**
   * GET /curiosity/resurface?stimulus=&limit=
   * Prior insights related to the current conversation turn
   */
  app.get('/curiosity/resurface', async (c) => {
    const requestId = getRequestId(c);
    const stimulus = c.req.query('stimulus');

    if (!stimulus || stimulus.trim() === '') {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'stimulus is required' },
        requestId
      );
    }

    const limit = parseLimit(
      c.req.query('limit'),
      DEFAULT_RESURFACE_LIMIT,
      MAX_RESURFACE_LIMIT
    );
    const items = await engine.resurfaceCuriosities(stimulus, limit);

    return successResponse(c, { items: items.map(formatResurfaced) }, requestId);
  });

  /**
   * GET /curiosity/search?q=&limit=
   * Kept insights matching a text query
   */
  app.get('/curiosity/search', async (c) => {
    const requestId = getRequestId(c);
    const query = c.req.query('q');

    if (!query || query.trim() === '') {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'q is required' },
        requestId
      );
    }

    const limit = parseLimit(
      c.req.query('limit'),
      DEFAULT_SEARCH_LIMIT,
      MAX_SEARCH_LIMIT
    );
    const results = await engine.searchInsights(query, limit);

    return successResponse(
      c,
      { query, results: results.map(formatInsight), count: results.length },
      requestId
    );
  });

  /**
   * POST /curiosity/background/start
   */
  app.post('/curiosity/background/start', (c) => {
    const requestId = getRequestId(c);
    engine.startBackground();

    return successResponse(
      c,
      { backgroundRunning: engine.isBackgroundRunning() },
      requestId
    );
  });

  /**
   * POST /curiosity/background/stop
   */
  app.post('/curiosity/background/stop', async (c) => {
    const requestId = getRequestId(c);
    await engine.stopBackground();

    return successResponse(
      c,
      { backgroundRunning: engine.isBackgroundRunning() },
      requestId
    );
  });

  return app;
}
