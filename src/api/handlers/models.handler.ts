import type { FastifyRequest, FastifyReply } from 'fastify';
import type { KnownModel } from '../../services/llm/models.js';

export function createModelsHandler(models: readonly KnownModel[], defaultModel: string) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ defaultModel, models });
  };
}
