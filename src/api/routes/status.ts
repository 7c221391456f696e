import type { FastifyInstance } from 'fastify';
import type { KnowledgeBase } from '../../rag/knowledgeBase.js';
import type { StatusResponse } from '../schemas.js';

export function registerStatusRoute(app: FastifyInstance, knowledgeBase: KnowledgeBase): void {
  app.get<{ Reply: StatusResponse }>('/status', async (_req, reply) => {
    return reply.send(await knowledgeBase.status());
  });
}
