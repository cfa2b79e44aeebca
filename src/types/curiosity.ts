/**
 * Curiosity Domain Types
 *
 * A tangent is a thought that was a poor fit for the live conversation
 * but interesting on its own. Admitted tangents wait in a bounded queue
 * until a drain researches, synthesizes and stores them as insights.
 *
 * Insight retention (kept / discarded) belongs to the insight store,
 * never to the engine.
 */

/**
 * Where a stored insight came from
 */
export type InsightOrigin = 'curiosity' | 'reflection' | 'connection';

/**
 * Tangent waiting in the queue. Frozen on admission.
 */
export interface Tangent {
  readonly text: string;
  readonly seedQuery: string;
  readonly relevance: number; // 0-1, fit to the originating turn
  readonly interest: number; // 0-1, standalone interest
  readonly queuedAt: Date;
}

/**
 * Parameters for submitting a tangent
 */
export interface QueueTangentParams {
  text: string;
  seedQuery: string;
  relevance: number;
  interest: number;
}

/**
 * Parameters for storing a processed insight
 */
export interface StoreInsightParams {
  seedQuery: string;
  tangent: string;
  research: string;
  insight: string;
  qualityScore: number;
  origin: InsightOrigin;
}

/**
 * Parameters for querying stored insights by text
 */
export interface SearchInsightsParams {
  query: string;
  limit: number;
  minQuality: number;
}

/**
 * Stored insight as returned by the insight store
 */
export interface InsightRecord {
  id: string;
  origin: InsightOrigin;
  seedQuery: string;
  tangent: string;
  insight: string;
  qualityScore: number;
  createdAt: Date;
}

/**
 * Aggregate counters over every stored insight
 */
export interface InsightStats {
  total: number;
  kept: number;
  avgQuality: number;
  lastCuriosity: Date | null;
}

/**
 * Prior insight pulled back into a conversation turn
 */
export interface ResurfacedInsight {
  tangent: string;
  originalContext: string;
  insight: string;
  timestamp: Date;
  qualityScore: number;
}

/**
 * Outcome of a single drain call
 */
export interface DrainReport {
  processed: number;
  kept: number;
}

/**
 * Truncated view of a queued tangent
 */
export interface TangentPreview {
  tangent: string;
  interest: number;
}

/**
 * Engine status snapshot, computed on demand
 */
export interface EngineStatus {
  queue: {
    size: number;
    items: TangentPreview[];
  };
  backgroundRunning: boolean;
  insights: InsightStats;
}

/**
 * Counters reported when the insight store cannot be reached
 */
export const EMPTY_INSIGHT_STATS: InsightStats = {
  total: 0,
  kept: 0,
  avgQuality: 0,
  lastCuriosity: null,
};
