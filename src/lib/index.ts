/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseAdminConfig } from './supabase.js';
export { createLLMClient } from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export { createLogger, setLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
