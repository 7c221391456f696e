import Fastify, { type FastifyInstance } from 'fastify';
import type { KnowledgeBase } from '../rag/knowledgeBase.js';
import { RagbaseError } from '../errors/base.js';
import { registerQueryRoute } from './routes/query.js';
import { registerIndexDirRoute } from './routes/indexDir.js';
import { registerStatusRoute } from './routes/status.js';

export interface ApiServerDeps {
  knowledgeBase: KnowledgeBase;
}

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_CONFIGURATION: 400,
  INDEX_NOT_FOUND: 404,
  DIMENSION_MISMATCH: 409,
  BUILD_CANCELLED: 409,
  EMBEDDING_UNAVAILABLE: 503,
};

/**
 * Creates a Fastify server with the query, index and status routes registered.
 * Does NOT call listen(); the caller does that (or uses server.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof RagbaseError) {
      return reply.status(STATUS_BY_CODE[err.code] ?? 500).send({ error: err.message, code: err.code });
    }
    return reply.status(err.statusCode ?? 500).send({ error: err.message });
  });

  registerQueryRoute(app, deps.knowledgeBase);
  registerIndexDirRoute(app, deps.knowledgeBase);
  registerStatusRoute(app, deps.knowledgeBase);

  return app;
}
