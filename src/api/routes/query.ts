import type { FastifyInstance } from 'fastify';
import type { KnowledgeBase } from '../../rag/knowledgeBase.js';
import { describeNoResults, formatContext, toPassages } from '../../enhancers/contextFormatter.js';
import { queryBodySchema } from '../schemas.js';
import type { ErrorResponse, QueryResponse } from '../schemas.js';

export function registerQueryRoute(app: FastifyInstance, knowledgeBase: KnowledgeBase): void {
  app.post<{ Reply: QueryResponse | ErrorResponse }>('/query', async (req, reply) => {
    const parsed = queryBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'query is required; k and minScore must be numbers' });
    }
    const { query, k, minScore } = parsed.data;
    const outcome = await knowledgeBase.query(query, {
      ...(k !== undefined ? { k } : {}),
      ...(minScore !== undefined ? { minScore } : {}),
    });
    return reply.send({
      results: toPassages(outcome.results),
      indexAvailable: outcome.indexAvailable,
      formatted: formatContext(outcome.results, query) || describeNoResults(outcome, query),
    });
  });
}
