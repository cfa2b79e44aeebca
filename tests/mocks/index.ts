/**
 * Test Mocks
 * In-memory stand-ins for the curiosity engine's ports
 */

import { vi } from 'vitest';

import type {
  InsightRecord,
  PersistencePort,
  ResearchHit,
  ResearchPort,
  Result,
  StoreInsightParams,
  Synthesis,
  SynthesisPort,
} from '@/types/index.js';
import { EMPTY_INSIGHT_STATS, success } from '@/types/index.js';

/**
 * Research port returning the same hits for every query
 */
export function createMockResearch(hits: ResearchHit[] = []) {
  return {
    search: vi.fn<ResearchPort['search']>().mockResolvedValue(success(hits)),
  };
}

/**
 * Synthesis port returning a fixed synthesis
 */
export function createMockSynthesis(
  synthesis: Synthesis = { insight: 'Synthesized insight', qualityScore: 0.9 }
) {
  return {
    synthesize: vi
      .fn<SynthesisPort['synthesize']>()
      .mockResolvedValue(success(synthesis)),
  };
}

/**
 * Persistence port that records stores and applies a keep threshold
 */
export function createMockPersistence(keepThreshold: number = 0.6) {
  const stored: StoreInsightParams[] = [];

  return {
    stored,
    store: vi
      .fn<PersistencePort['store']>()
      .mockImplementation(
        async (params: StoreInsightParams): Promise<Result<boolean>> => {
          stored.push(params);
          return success(params.qualityScore >= keepThreshold);
        }
      ),
    searchInsights: vi
      .fn<PersistencePort['searchInsights']>()
      .mockResolvedValue(success<InsightRecord[]>([])),
    stats: vi
      .fn<PersistencePort['stats']>()
      .mockResolvedValue(success({ ...EMPTY_INSIGHT_STATS })),
  };
}
