/**
 * Collaborator Ports
 *
 * The curiosity engine reaches the outside world only through these
 * three interfaces. A port is either supplied in full or left undefined;
 * nothing probes for individual methods.
 */

import type {
  InsightRecord,
  InsightStats,
  SearchInsightsParams,
  StoreInsightParams,
} from './curiosity.js';
import type { Result } from './result.js';

/**
 * One web research hit
 */
export interface ResearchHit {
  title: string;
  snippet: string;
  url?: string;
}

/**
 * Synthesized insight with a self-assessed quality score
 */
export interface Synthesis {
  insight: string;
  qualityScore: number;
}

/**
 * Gathers raw research for a query
 */
export interface ResearchPort {
  search(query: string, limit: number): Promise<Result<ResearchHit[]>>;
}

/**
 * Turns a tangent and its research into an insight
 */
export interface SynthesisPort {
  synthesize(tangent: string, research: string): Promise<Result<Synthesis>>;
}

/**
 * Durable insight storage. Owns the keep threshold.
 */
export interface PersistencePort {
  /** Resolves to whether the insight was kept */
  store(params: StoreInsightParams): Promise<Result<boolean>>;
  searchInsights(params: SearchInsightsParams): Promise<Result<InsightRecord[]>>;
  stats(): Promise<Result<InsightStats>>;
}

/**
 * Failure codes produced at port boundaries
 */
export const PORT_ERROR_CODES = {
  RESEARCH_FAILED: 'RESEARCH_FAILED',
  SYNTHESIS_FAILED: 'SYNTHESIS_FAILED',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;
