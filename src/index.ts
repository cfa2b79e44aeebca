/**
 * Application Entry Point
 *
 * Wires the insight store, research and synthesis adapters into a single
 * curiosity engine, serves the Hono application and owns the background
 * worker's lifecycle.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import type { AppConfig } from './config.js';
import { loadConfig } from './config.js';
import {
  createLLMClient,
  createLogger,
  createSupabaseAdmin,
  setLogLevel,
} from './lib/index.js';
import {
  createCuriosityEngine,
  createInsightStoreDb,
  createResearchClient,
  createSynthesisService,
  createTangentQueue,
} from './services/index.js';
import type { ResearchPort, SynthesisPort } from './types/index.js';
import { errorMessage } from './types/index.js';

const log = createLogger('server');

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  log.error(errorMessage(err));
  process.exit(1);
}

setLogLevel(config.logLevel);

// Insight store
const supabase = createSupabaseAdmin(config.supabase);
const persistence = createInsightStoreDb(supabase, {
  keepThreshold: config.curiosity.keepThreshold,
});

// Optional ports
const search: ResearchPort | undefined =
  config.braveApiKey !== undefined
    ? createResearchClient({ apiKey: config.braveApiKey })
    : undefined;

const synthesize: SynthesisPort | undefined =
  config.openRouterApiKey !== undefined
    ? createSynthesisService({
        llmClient: createLLMClient({ apiKey: config.openRouterApiKey }),
        config: { model: config.synthesisModel },
      })
    : undefined;

// Engine
const curiosityLogger = createLogger('curiosity');
const engine = createCuriosityEngine({
  persistence,
  ...(search !== undefined && { search }),
  ...(synthesize !== undefined && { synthesize }),
  queue: createTangentQueue({
    capacity: config.curiosity.queueCapacity,
    logger: curiosityLogger,
  }),
  config: {
    maxPerCycle: config.curiosity.maxPerCycle,
    cycleIntervalMs: config.curiosity.cycleIntervalMs,
  },
  logger: curiosityLogger,
});

const app = createApp({
  engine,
  ...(config.controlToken !== undefined && {
    controlToken: config.controlToken,
  }),
  allowedOrigins: config.allowedOrigins,
  accessLog: true,
  logger: log,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`Server listening on port ${info.port}`);
});

if (search !== undefined) {
  engine.startBackground();
} else {
  log.info('Curiosity engine idle: no research client configured');
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down`);

  await engine.stopBackground();
  server.close((err) => {
    if (err) {
      log.error('Error closing server', { error: err.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

export { app, engine };
