/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  isSuccess,
  isFailure,
  errorMessage,
  settle,
} from './result.js';
export type {
  InsightOrigin,
  Tangent,
  QueueTangentParams,
  StoreInsightParams,
  SearchInsightsParams,
  InsightRecord,
  InsightStats,
  ResurfacedInsight,
  DrainReport,
  TangentPreview,
  EngineStatus,
} from './curiosity.js';
export { EMPTY_INSIGHT_STATS } from './curiosity.js';
export type {
  ResearchHit,
  Synthesis,
  ResearchPort,
  SynthesisPort,
  PersistencePort,
} from './ports.js';
export { PORT_ERROR_CODES } from './ports.js';
export type { LLMMessage, LLMRequest, LLMResponse, LLMClient } from './llm.js';
