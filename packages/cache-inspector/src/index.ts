/**
 * @stagecraft/cache-inspector - artifact graph and model cache over HTTP
 */

export { CacheInspector } from './inspector.js';
export type { CacheInspectorOptions, ArtifactEviction } from './inspector.js';
export {
  createCacheInspectorRouter,
  createInspectorHandlers,
  artifactParamsSchema,
  modelParamsSchema,
} from './router.js';
export type { ApiResponse, InspectorHandlers } from './router.js';
export { createCacheInspectorApp, startCacheInspectorServer, DEFAULT_INSPECTOR_PORT } from './server.js';
export type { ServerOptions } from './server.js';
export type { ArtifactGraph, ArtifactGraphEdge, ArtifactGraphNode, ModelEntrySummary, PruneSummary } from './types.js';
