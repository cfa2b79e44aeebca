/**
 * CuriosityEngine Implementation
 *
 * Turns queued tangents into stored insights:
 *   research (ResearchPort) → synthesis (SynthesisPort) → store (PersistencePort)
 *
 * Runs either as an explicit drain (bounded by maxPerCycle) or as a single
 * background worker that drains every cycleIntervalMs.
 *
 * GUARDRAILS:
 * - No port failure ever propagates out of the engine; each one degrades
 *   to empty research, raw-research fallback, `false` or an empty list
 * - At most one research, one synthesis and one store call per tangent,
 *   no retries at this layer
 * - Tangents with no research are dead ends and are never stored
 * - Keep/discard is decided by the insight store, not here
 * - One background worker per engine; once stop is requested it starts
 *   no further drains and processes no further tangents
 * - A stopping worker still counts as running until it exits or the stop
 *   times out; start is refused meanwhile
 */

import { delay, settlesWithin } from '@/lib/async.js';
import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type {
  DrainReport,
  EngineStatus,
  InsightRecord,
  PersistencePort,
  QueueTangentParams,
  ResearchPort,
  ResurfacedInsight,
  Synthesis,
  SynthesisPort,
  Tangent,
} from '@/types/index.js';
import {
  EMPTY_INSIGHT_STATS,
  PORT_ERROR_CODES,
  errorMessage,
  settle,
} from '@/types/index.js';

import type { TangentQueue } from './tangent-queue.js';
import { createTangentQueue } from './tangent-queue.js';

/**
 * Research hits requested per tangent
 */
export const RESEARCH_RESULT_LIMIT = 5;

/**
 * Minimum stored quality for an insight to resurface in conversation
 */
export const RESURFACE_MIN_QUALITY = 0.6;

export const DEFAULT_RESURFACE_LIMIT = 3;
export const DEFAULT_SEARCH_LIMIT = 5;

const PREVIEW_LENGTH = 80;

export interface CuriosityEngineConfig {
  /** Max tangents processed per drain (default 3) */
  maxPerCycle: number;
  /** Spacing between background drains (default 60s) */
  cycleIntervalMs: number;
  /** Granularity at which the background sleep re-checks for stop (default 1s) */
  tickMs: number;
  /** How long stopBackground waits for the worker to exit (default 5s) */
  stopTimeoutMs: number;
}

export const DEFAULT_ENGINE_CONFIG: CuriosityEngineConfig = {
  maxPerCycle: 3,
  cycleIntervalMs: 60_000,
  tickMs: 1_000,
  stopTimeoutMs: 5_000,
};

/**
 * CuriosityEngine dependencies
 */
export interface CuriosityEngineDeps {
  persistence: PersistencePort;
  search?: ResearchPort;
  synthesize?: SynthesisPort;
  queue?: TangentQueue;
  config?: Partial<CuriosityEngineConfig>;
  logger?: Logger;
}

/**
 * CuriosityEngine interface
 */
export interface CuriosityEngine {
  queueTangent(params: QueueTangentParams): boolean;
  /** Resolves true iff the insight was kept by the store */
  processOne(item: Tangent): Promise<boolean>;
  drain(): Promise<DrainReport>;
  resurfaceCuriosities(
    currentStimulus: string,
    limit?: number
  ): Promise<ResurfacedInsight[]>;
  searchInsights(query: string, limit?: number): Promise<InsightRecord[]>;
  startBackground(): void;
  stopBackground(): Promise<void>;
  isBackgroundRunning(): boolean;
  queueSize(): number;
  status(): Promise<EngineStatus>;
}

interface BackgroundWorker {
  controller: AbortController;
  done: Promise<void>;
  /** Set once stop has been requested */
  stopping: Promise<void> | null;
}

function preview(text: string, length: number = PREVIEW_LENGTH): string {
  return text.slice(0, length);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function validateConfig(config: CuriosityEngineConfig): void {
  if (!Number.isInteger(config.maxPerCycle) || config.maxPerCycle < 1) {
    throw new Error('maxPerCycle must be a positive integer');
  }
  const durations: Array<[string, number]> = [
    ['cycleIntervalMs', config.cycleIntervalMs],
    ['tickMs', config.tickMs],
    ['stopTimeoutMs', config.stopTimeoutMs],
  ];
  for (const [name, value] of durations) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`${name} must be a positive number`);
    }
  }
}

/**
 * Create CuriosityEngine instance
 */
export function createCuriosityEngine(
  deps: CuriosityEngineDeps
): CuriosityEngine {
  const { persistence, search, synthesize } = deps;
  const logger = deps.logger ?? silentLogger;
  const config: CuriosityEngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...deps.config,
  };
  validateConfig(config);

  const queue = deps.queue ?? createTangentQueue({ logger });
  let worker: BackgroundWorker | null = null;

  /**
   * Research step. Any failure counts as "no research".
   */
  async function gatherResearch(text: string): Promise<string> {
    if (search === undefined) {
      return '';
    }

    const result = await settle(PORT_ERROR_CODES.RESEARCH_FAILED, () =>
      search.search(text, RESEARCH_RESULT_LIMIT)
    );
    if (!result.success) {
      logger.warn('Research failed', {
        code: result.error.code,
        error: result.error.message,
      });
      return '';
    }

    return result.data
      .map((hit) => `- ${hit.title}: ${hit.snippet}`)
      .join('\n');
  }

  /**
   * Synthesis step. Falls back to the raw research scored by the
   * tangent's own interest.
   */
  async function synthesizeInsight(
    item: Tangent,
    research: string
  ): Promise<Synthesis> {
    const fallback: Synthesis = {
      insight: research,
      qualityScore: item.interest,
    };

    if (synthesize === undefined) {
      return fallback;
    }

    const result = await settle(PORT_ERROR_CODES.SYNTHESIS_FAILED, () =>
      synthesize.synthesize(item.text, research)
    );
    if (!result.success) {
      logger.warn('Synthesis failed, storing raw research', {
        code: result.error.code,
        error: result.error.message,
      });
      return fallback;
    }

    return result.data;
  }

  async function processOne(item: Tangent): Promise<boolean> {
    logger.info('Exploring tangent', { tangent: preview(item.text) });

    const research = await gatherResearch(item.text);
    if (research === '') {
      logger.info('Dead end', { tangent: preview(item.text) });
      return false;
    }

    const { insight, qualityScore } = await synthesizeInsight(item, research);

    const stored = await settle(PORT_ERROR_CODES.PERSISTENCE_FAILED, () =>
      persistence.store({
        seedQuery: item.seedQuery,
        tangent: item.text,
        research,
        insight,
        qualityScore,
        origin: 'curiosity',
      })
    );
    if (!stored.success) {
      logger.error('Failed to store insight', {
        code: stored.error.code,
        error: stored.error.message,
      });
      return false;
    }

    const kept = stored.data;
    logger.info(kept ? 'Insight kept' : 'Insight discarded', {
      qualityScore,
      tangent: preview(item.text, 60),
    });
    return kept;
  }

  /**
   * Process up to maxPerCycle tangents. The background worker passes its
   * abort signal so a stop takes effect between tangents.
   */
  async function drainQueue(signal?: AbortSignal): Promise<DrainReport> {
    let processed = 0;
    let kept = 0;

    while (processed < config.maxPerCycle && signal?.aborted !== true) {
      const item = queue.pop();
      if (item === null) {
        break;
      }
      processed++;
      if (await processOne(item)) {
        kept++;
      }
    }

    if (processed > 0) {
      logger.info('Drain complete', { processed, kept });
    }

    return { processed, kept };
  }

  /**
   * Sleep for one cycle in ticks of at most tickMs, waking early on abort
   */
  async function sleepCycle(signal: AbortSignal): Promise<void> {
    let remaining = config.cycleIntervalMs;
    while (remaining > 0 && !signal.aborted) {
      const step = Math.min(config.tickMs, remaining);
      await delay(step, signal);
      remaining -= step;
    }
  }

  /**
   * Wait for a stopped worker's loop, then release the slot
   */
  async function awaitExit(current: BackgroundWorker): Promise<void> {
    const exited = await settlesWithin(current.done, config.stopTimeoutMs);
    if (!exited) {
      logger.warn('Background worker did not exit in time', {
        stopTimeoutMs: config.stopTimeoutMs,
      });
    }

    if (worker === current) {
      worker = null;
    }
    logger.info('Background worker stopped');
  }

  async function runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        if (queue.size > 0) {
          await drainQueue(signal);
        }
      } catch (err) {
        logger.error('Background drain failed', { error: errorMessage(err) });
      }
      await sleepCycle(signal);
    }
  }

  return {
    queueTangent(params: QueueTangentParams): boolean {
      return queue.push(params);
    },

    processOne,

    drain(): Promise<DrainReport> {
      return drainQueue();
    },

    async resurfaceCuriosities(
      currentStimulus: string,
      limit: number = DEFAULT_RESURFACE_LIMIT
    ): Promise<ResurfacedInsight[]> {
      if (currentStimulus.trim() === '') {
        return [];
      }
      const boundedLimit = Math.max(1, Math.floor(limit));

      const result = await settle(PORT_ERROR_CODES.PERSISTENCE_FAILED, () =>
        persistence.searchInsights({
          query: currentStimulus,
          limit: boundedLimit,
          minQuality: RESURFACE_MIN_QUALITY,
        })
      );
      if (!result.success) {
        logger.error('Error resurfacing insights', {
          code: result.error.code,
          error: result.error.message,
        });
        return [];
      }

      const resurfaced = result.data.slice(0, boundedLimit).map((record) => ({
        tangent: record.tangent,
        originalContext: record.seedQuery,
        insight: record.insight,
        timestamp: record.createdAt,
        qualityScore: record.qualityScore,
      }));

      if (resurfaced.length > 0) {
        logger.info('Resurfaced past insights', {
          count: resurfaced.length,
          stimulus: preview(currentStimulus, 60),
        });
      }

      return resurfaced;
    },

    async searchInsights(
      query: string,
      limit: number = DEFAULT_SEARCH_LIMIT
    ): Promise<InsightRecord[]> {
      if (query.trim() === '') {
        return [];
      }

      const result = await settle(PORT_ERROR_CODES.PERSISTENCE_FAILED, () =>
        persistence.searchInsights({
          query,
          limit: Math.max(1, Math.floor(limit)),
          minQuality: 0,
        })
      );
      if (!result.success) {
        logger.error('Error searching insights', {
          code: result.error.code,
          error: result.error.message,
        });
        return [];
      }
      return result.data;
    },

    startBackground(): void {
      if (worker !== null) {
        if (worker.stopping !== null) {
          logger.warn('Background worker is still stopping, start ignored');
        }
        return;
      }

      const controller = new AbortController();
      const done = runLoop(controller.signal);
      worker = { controller, done, stopping: null };

      logger.info('Background worker started', {
        cycleIntervalMs: config.cycleIntervalMs,
      });
    },

    async stopBackground(): Promise<void> {
      const current = worker;
      if (current === null) {
        return;
      }

      if (current.stopping === null) {
        current.controller.abort();
        current.stopping = awaitExit(current);
      }
      await current.stopping;
    },

    isBackgroundRunning(): boolean {
      return worker !== null;
    },

    queueSize(): number {
      return queue.size;
    },

    async status(): Promise<EngineStatus> {
      const items = queue.peekAll().map((item) => ({
        tangent: preview(item.text),
        interest: item.interest,
      }));

      const stats = await settle(PORT_ERROR_CODES.PERSISTENCE_FAILED, () =>
        persistence.stats()
      );
      if (!stats.success) {
        logger.error('Failed to read insight stats', {
          code: stats.error.code,
          error: stats.error.message,
        });
      }

      return {
        queue: {
          size: items.length,
          items,
        },
        backgroundRunning: worker !== null,
        insights: stats.success
          ? { ...stats.data, avgQuality: round3(stats.data.avgQuality) }
          : { ...EMPTY_INSIGHT_STATS },
      };
    },
  };
}
