import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';

export type HealthCheck = () => Promise<boolean>;

async function runCheck(name: string, check: HealthCheck): Promise<boolean> {
  try {
    return await check();
  } catch (error) {
    logger.warn({ error, service: name }, 'Health check failed');
    return false;
  }
}

export function createHealthHandler(checks: Record<string, HealthCheck>, environment: string) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]) => [name, await runCheck(name, check)] as const)
    );
    const services = Object.fromEntries(entries);
    const healthy = entries.every(([, ok]) => ok);

    return reply.code(200).send({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment,
      services,
    });
  };
}
