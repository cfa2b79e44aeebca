/**
 * Environment Configuration
 *
 * Parsed once by the entry point; nothing else reads process.env.
 */

import { z } from 'zod';

import type { LogLevel } from './lib/logger.js';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SUPABASE_URL: z.string().trim().url('SUPABASE_URL must be a URL'),
  SUPABASE_SERVICE_KEY: z.string().trim().min(1, 'SUPABASE_SERVICE_KEY is required'),
  BRAVE_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  CURIOSITY_SYNTHESIS_MODEL: z.string().trim().min(1).default('openai/gpt-4o-mini'),
  CURIOSITY_MAX_PER_CYCLE: z.coerce.number().int().positive().default(3),
  CURIOSITY_CYCLE_INTERVAL_MS: z.coerce.number().positive().default(60_000),
  CURIOSITY_QUEUE_CAPACITY: z.coerce.number().int().positive().default(50),
  CURIOSITY_KEEP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  CURIOSITY_CONTROL_TOKEN: optionalString,
  ALLOWED_ORIGINS: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  port: number;
  supabase: {
    url: string;
    serviceKey: string;
  };
  braveApiKey: string | undefined;
  openRouterApiKey: string | undefined;
  synthesisModel: string;
  curiosity: {
    maxPerCycle: number;
    cycleIntervalMs: number;
    queueCapacity: number;
    keepThreshold: number;
  };
  controlToken: string | undefined;
  allowedOrigins: string[];
  logLevel: LogLevel;
}

const DEFAULT_ORIGINS = ['http://localhost:3000'];

function parseOrigins(value: string | undefined): string[] {
  if (value === undefined) {
    return DEFAULT_ORIGINS;
  }
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length > 0 ? origins : DEFAULT_ORIGINS;
}

/**
 * Validate the environment and build the application config.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    supabase: {
      url: vars.SUPABASE_URL,
      serviceKey: vars.SUPABASE_SERVICE_KEY,
    },
    braveApiKey: vars.BRAVE_API_KEY,
    openRouterApiKey: vars.OPENROUTER_API_KEY,
    synthesisModel: vars.CURIOSITY_SYNTHESIS_MODEL,
    curiosity: {
      maxPerCycle: vars.CURIOSITY_MAX_PER_CYCLE,
      cycleIntervalMs: vars.CURIOSITY_CYCLE_INTERVAL_MS,
      queueCapacity: vars.CURIOSITY_QUEUE_CAPACITY,
      keepThreshold: vars.CURIOSITY_KEEP_THRESHOLD,
    },
    controlToken: vars.CURIOSITY_CONTROL_TOKEN,
    allowedOrigins: parseOrigins(vars.ALLOWED_ORIGINS),
    logLevel: vars.LOG_LEVEL,
  };
}
