/**
 * Service Layer Exports
 *
 * The curiosity engine plus the adapters that back its ports.
 */

// TangentQueue
export type { TangentQueue, TangentQueueOptions } from './tangent-queue.js';
export {
  createTangentQueue,
  isAdmissible,
  DEFAULT_QUEUE_CAPACITY,
} from './tangent-queue.js';

// CuriosityEngine
export type {
  CuriosityEngine,
  CuriosityEngineConfig,
  CuriosityEngineDeps,
} from './curiosity.service.js';
export {
  createCuriosityEngine,
  DEFAULT_ENGINE_CONFIG,
  RESURFACE_MIN_QUALITY,
} from './curiosity.service.js';

// ResearchPort - Brave web search
export type { ResearchClientConfig } from './research.client.js';
export { createResearchClient } from './research.client.js';

// SynthesisPort - LLM
export type { SynthesisServiceConfig } from './synthesis.service.js';
export { createSynthesisService } from './synthesis.service.js';

// PersistencePort - Supabase
export { createInsightStoreDb, DEFAULT_KEEP_THRESHOLD } from './insight.db.js';
