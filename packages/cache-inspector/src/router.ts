import express from 'express';
import { z } from 'zod';
import { errorMessage } from '@stagecraft/core';
import { MODEL_KINDS, formatZodError } from '@stagecraft/pipeline';
import type { CacheInspector } from './inspector.js';

export interface ApiResponse {
  status: number;
  body: unknown;
}

const fingerprint = z.string().regex(/^[a-f0-9]{64}$/, 'expected a 64 character hex id');

export const artifactParamsSchema = z.object({
  kind: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'expected a stage kind'),
  dataId: fingerprint,
});

export const modelParamsSchema = z.object({
  kind: z.enum(MODEL_KINDS),
  key: fingerprint,
});

async function respond(handle: () => Promise<ApiResponse>): Promise<ApiResponse> {
  try {
    return await handle();
  } catch (err) {
    return { status: 500, body: { error: errorMessage(err) } };
  }
}

function invalid(error: z.ZodError): ApiResponse {
  return { status: 400, body: { error: 'invalid request', issues: formatZodError(error) } };
}

/**
 * Request handlers independent of express, keyed by route
 */
export function createInspectorHandlers(inspector: CacheInspector) {
  return {
    graph: () => respond(async () => ({ status: 200, body: await inspector.getGraph() })),

    models: () => respond(async () => ({ status: 200, body: { models: await inspector.listModels() } })),

    evictArtifact: (params: unknown) =>
      respond(async () => {
        const parsed = artifactParamsSchema.safeParse(params);
        if (!parsed.success) return invalid(parsed.error);
        const { kind, dataId } = parsed.data;
        const eviction = await inspector.evictArtifact(kind, dataId);
        if (!eviction.removed) return { status: 404, body: { error: `artifact not found: ${kind}:${dataId}` } };
        return { status: 200, body: eviction };
      }),

    evictModel: (params: unknown) =>
      respond(async () => {
        const parsed = modelParamsSchema.safeParse(params);
        if (!parsed.success) return invalid(parsed.error);
        const { kind, key } = parsed.data;
        if (!(await inspector.evictModel(kind, key))) {
          return { status: 404, body: { error: `model cache entry not found: ${kind}:${key}` } };
        }
        return { status: 200, body: { removed: true } };
      }),

    prune: () => respond(async () => ({ status: 200, body: await inspector.prune() })),
  };
}

export type InspectorHandlers = ReturnType<typeof createInspectorHandlers>;

export function createCacheInspectorRouter(inspector: CacheInspector): express.Router {
  const router = express.Router();
  const handlers = createInspectorHandlers(inspector);
  const send = (res: express.Response, { status, body }: ApiResponse) => {
    res.status(status).json(body);
  };

  router.get('/graph', async (_req, res) => {
    send(res, await handlers.graph());
  });

  router.get('/models', async (_req, res) => {
    send(res, await handlers.models());
  });

  router.delete('/artifacts/:kind/:dataId', async (req, res) => {
    send(res, await handlers.evictArtifact(req.params));
  });

  router.delete('/models/:kind/:key', async (req, res) => {
    send(res, await handlers.evictModel(req.params));
  });

  router.post('/prune', async (_req, res) => {
    send(res, await handlers.prune());
  });

  return router;
}
