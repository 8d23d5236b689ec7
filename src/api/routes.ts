import type { FastifyInstance } from 'fastify';
import { createExtractHandler } from './handlers/extract.handler.js';
import { createModelsHandler } from './handlers/models.handler.js';
import { createGlossaryHandler, type GlossaryParams } from './handlers/glossary.handler.js';
import { createHealthHandler, type HealthCheck } from './handlers/health.handler.js';
import { extractResponseSchema, modelsResponseSchema } from './schemas/extract.schema.js';
import { errorResponseSchema, glossaryParamsSchema } from './schemas/common.schema.js';
import type { TermExtractionPipeline } from '../services/pipeline/TermExtractionPipeline.js';
import type { KnownModel } from '../services/llm/models.js';

export interface RouteDependencies {
  pipeline: Pick<TermExtractionPipeline, 'run'>;
  models: readonly KnownModel[];
  defaultModel: string;
  outputDir: string;
  healthChecks: Record<string, HealthCheck>;
  environment: string;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  fastify.post('/extract', {
    schema: {
      response: {
        200: extractResponseSchema,
        400: errorResponseSchema,
        422: errorResponseSchema,
        500: errorResponseSchema,
        502: errorResponseSchema,
      },
    },
    handler: createExtractHandler(deps.pipeline),
  });

  fastify.get('/models', {
    schema: {
      response: {
        200: modelsResponseSchema,
      },
    },
    handler: createModelsHandler(deps.models, deps.defaultModel),
  });

  fastify.get<{ Params: GlossaryParams }>('/glossary/:fileName', {
    schema: {
      params: glossaryParamsSchema,
    },
    handler: createGlossaryHandler(deps.outputDir),
  });

  fastify.get('/health', {
    handler: createHealthHandler(deps.healthChecks, deps.environment),
  });
}
