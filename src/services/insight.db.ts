/**
 * Insight Store Database Adapter
 * Implements PersistencePort using Supabase
 *
 * Table: curiosity_insights (supabase/migrations/001_curiosity_insights.sql)
 *
 * Policy:
 * - Every processed insight is stored; only those scoring at least
 *   keepThreshold are marked kept
 * - Text search returns kept insights only, best quality first, then newest
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  InsightOrigin,
  InsightRecord,
  InsightStats,
  PersistencePort,
  Result,
  SearchInsightsParams,
  StoreInsightParams,
} from '@/types/index.js';
import {
  EMPTY_INSIGHT_STATS,
  PORT_ERROR_CODES,
  errorMessage,
  failure,
  success,
} from '@/types/index.js';

export const INSIGHTS_TABLE = 'curiosity_insights';
export const DEFAULT_KEEP_THRESHOLD = 0.6;

/**
 * Database row types
 */
interface InsightRow {
  id: string;
  origin: string;
  seed_query: string | null;
  tangent: string;
  insight: string | null;
  quality_score: number;
  created_at: string;
}

const statsRowSchema = z.object({
  total: z.coerce.number(),
  kept: z.coerce.number(),
  avg_quality: z.coerce.number().nullable(),
  last_curiosity: z.string().nullable(),
});

function toOrigin(value: string): InsightOrigin {
  switch (value) {
    case 'reflection':
    case 'connection':
      return value;
    default:
      return 'curiosity';
  }
}

/**
 * Map database row to InsightRecord
 */
function mapRowToInsight(row: InsightRow): InsightRecord {
  return {
    id: row.id,
    origin: toOrigin(row.origin),
    seedQuery: row.seed_query ?? '',
    tangent: row.tangent,
    insight: row.insight ?? '',
    qualityScore: row.quality_score,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create PersistencePort implementation using Supabase
 */
export function createInsightStoreDb(
  supabase: SupabaseClient,
  options: { keepThreshold?: number } = {}
): PersistencePort {
  const keepThreshold = options.keepThreshold ?? DEFAULT_KEEP_THRESHOLD;

  return {
    /**
     * Store an insight, marking it kept when it clears the threshold
     */
    async store(params: StoreInsightParams): Promise<Result<boolean>> {
      const kept = params.qualityScore >= keepThreshold;

      try {
        const { error } = await supabase.from(INSIGHTS_TABLE).insert({
          origin: params.origin,
          seed_query: params.seedQuery,
          tangent: params.tangent,
          research: params.research,
          insight: params.insight,
          quality_score: params.qualityScore,
          kept,
        });

        if (error !== null) {
          return failure(
            PORT_ERROR_CODES.PERSISTENCE_FAILED,
            `Failed to store insight: ${error.message}`
          );
        }
      } catch (err) {
        return failure(PORT_ERROR_CODES.PERSISTENCE_FAILED, errorMessage(err));
      }

      return success(kept);
    },

    /**
     * Full-text search over kept insights
     */
    async searchInsights(
      params: SearchInsightsParams
    ): Promise<Result<InsightRecord[]>> {
      const query = params.query.trim();
      if (query === '') {
        return success([]);
      }

      try {
        const { data, error } = await supabase
          .from(INSIGHTS_TABLE)
          .select('id, origin, seed_query, tangent, insight, quality_score, created_at')
          .eq('kept', true)
          .gte('quality_score', params.minQuality)
          .textSearch('search_vector', query, {
            type: 'plain',
            config: 'english',
          })
          .order('quality_score', { ascending: false })
          .order('created_at', { ascending: false })
          .limit(params.limit);

        if (error !== null) {
          return failure(
            PORT_ERROR_CODES.PERSISTENCE_FAILED,
            `Failed to search insights: ${error.message}`
          );
        }

        return success((data as InsightRow[]).map(mapRowToInsight));
      } catch (err) {
        return failure(PORT_ERROR_CODES.PERSISTENCE_FAILED, errorMessage(err));
      }
    },

    /**
     * Aggregate counters over all stored insights
     */
    async stats(): Promise<Result<InsightStats>> {
      try {
        const { data, error } = await supabase.rpc('curiosity_insight_stats');

        if (error !== null) {
          return failure(
            PORT_ERROR_CODES.PERSISTENCE_FAILED,
            `Failed to get insight stats: ${error.message}`
          );
        }

        const row: unknown = Array.isArray(data) ? data[0] : data;
        if (row === undefined || row === null) {
          return success({ ...EMPTY_INSIGHT_STATS });
        }

        const parsed = statsRowSchema.safeParse(row);
        if (!parsed.success) {
          return failure(
            PORT_ERROR_CODES.INVALID_RESPONSE,
            'Unexpected insight stats payload'
          );
        }

        return success({
          total: parsed.data.total,
          kept: parsed.data.kept,
          avgQuality: parsed.data.avg_quality ?? 0,
          lastCuriosity:
            parsed.data.last_curiosity !== null
              ? new Date(parsed.data.last_curiosity)
              : null,
        });
      } catch (err) {
        return failure(PORT_ERROR_CODES.PERSISTENCE_FAILED, errorMessage(err));
      }
    },
  };
}
