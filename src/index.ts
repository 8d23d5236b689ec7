import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { buildServer } from './server.js';
import { TermExtractionPipeline } from './services/pipeline/TermExtractionPipeline.js';
import { TransportFactory } from './services/llm/TransportFactory.js';
import { KNOWN_MODELS } from './services/llm/models.js';

const main = async (): Promise<void> => {
  logger.info('Initializing services...');

  const fastify = await buildServer({
    pipeline: TermExtractionPipeline.fromConfig(),
    models: KNOWN_MODELS,
    defaultModel: config.llm.model,
    outputDir: config.output.dir,
    environment: config.server.nodeEnv,
    maxUploadSizeMB: config.storage.maxUploadSizeMB,
    healthChecks: {
      chat: () => TransportFactory.chatTransport().testConnection(),
      completion: () => TransportFactory.completionTransport().testConnection(),
    },
  });

  logger.info('Services initialized');

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    await fastify.close();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await fastify.listen({
    port: config.server.port,
    host: '0.0.0.0',
  });
  logger.info(`Server listening on port ${config.server.port}`);
};

main().catch(err => {
  logger.error(err);
  process.exit(1);
});
