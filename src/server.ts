import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { logger } from './utils/logger.js';
import { registerRoutes, type RouteDependencies } from './api/routes.js';

export interface ServerDependencies extends RouteDependencies {
  maxUploadSizeMB: number;
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = logger;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(multipart, {
    limits: {
      fileSize: deps.maxUploadSizeMB * 1024 * 1024,
      files: 2,
    },
  });

  await registerRoutes(fastify, deps);

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    logger.error({ error, url: request.url, statusCode }, 'Request error');
    reply.code(statusCode).send({
      error: statusCode === 500 ? 'INTERNAL_ERROR' : error.code,
      message: error.message,
    });
  });

  return fastify;
}
