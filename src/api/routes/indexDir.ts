import type { FastifyInstance } from 'fastify';
import type { KnowledgeBase } from '../../rag/knowledgeBase.js';
import { indexBodySchema } from '../schemas.js';
import type { ClearResponse, ErrorResponse, IndexResponse } from '../schemas.js';

export function registerIndexDirRoute(app: FastifyInstance, knowledgeBase: KnowledgeBase): void {
  app.post<{ Reply: IndexResponse | ErrorResponse }>('/index', async (req, reply) => {
    const parsed = indexBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: 'directory must be a string; chunkSize and chunkOverlap must be integers' });
    }
    const { directory, chunkSize, chunkOverlap } = parsed.data;
    const result = await knowledgeBase.build(directory, {
      ...(chunkSize !== undefined ? { chunkSize } : {}),
      ...(chunkOverlap !== undefined ? { chunkOverlap } : {}),
    });
    return reply.send({
      documents: result.documents,
      chunks: result.chunks,
      dimension: result.index.dimension,
      indexPath: result.indexPath,
    });
  });

  app.delete<{ Reply: ClearResponse }>('/index', async (_req, reply) => {
    const removed = await knowledgeBase.clear();
    const { indexPath } = await knowledgeBase.status();
    return reply.send({ removed, indexPath });
  });
}
