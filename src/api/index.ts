/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the curiosity engine for all behaviour.
 */

export { createApp } from './app.js';
export { createCuriosityRoutes } from './routes/curiosity.js';
export { createHealthRoutes } from './routes/health.js';
