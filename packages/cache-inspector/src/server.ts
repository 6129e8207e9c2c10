import express from 'express';
import type { Server } from 'http';
import { logger as rootLogger } from '@stagecraft/core';
import type { Logger } from '@stagecraft/core';
import { createCacheInspectorRouter } from './router.js';
import type { CacheInspector } from './inspector.js';

export const DEFAULT_INSPECTOR_PORT = 4100;

export interface ServerOptions {
  port?: number;
  apiPath?: string;
  logger?: Logger;
}

export function createCacheInspectorApp(inspector: CacheInspector, options: Pick<ServerOptions, 'apiPath'> = {}) {
  const app = express();
  app.use(express.json());
  app.use(options.apiPath ?? '/api', createCacheInspectorRouter(inspector));
  return app;
}

/**
 * Start an Express server that exposes the cache inspector API
 */
export function startCacheInspectorServer(inspector: CacheInspector, options: ServerOptions = {}): Server {
  const logger = options.logger ?? rootLogger.child({ component: 'cache-inspector' });
  const port = options.port ?? DEFAULT_INSPECTOR_PORT;
  const apiPath = options.apiPath ?? '/api';

  return createCacheInspectorApp(inspector, { apiPath }).listen(port, () => {
    logger.info('cache inspector listening', { url: `http://localhost:${port}${apiPath}` });
  });
}
