import { FastifyPluginAsync } from 'fastify';
import { SweepService } from '../services/sweep-service';

export const SERVICE_NAME = 'inbox-sweeper';

export interface HealthRouteOptions {
  service: SweepService;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, { service }) => {
  // Basic health check
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0'
    };
  });

  // Detailed health check
  fastify.get('/detailed', async (_, reply) => {
    let storeHealthy = false;
    try {
      storeHealthy = (await service.healthCheck()).store;
    } catch (error) {
      fastify.log.error({ error }, 'Dedup store health check failed');
    }

    const health = {
      status: storeHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0',
      dependencies: {
        dedupStore: storeHealthy ? 'ok' : 'error'
      },
      activeRun: service.activeRun,
      lastScan: service.latest()?.completedAt ?? null,
      environment: process.env.NODE_ENV || 'development'
    };

    const statusCode = health.status === 'ok' ? 200 : 503;
    return reply.status(statusCode).send(health);
  });

  // Liveness check
  fastify.get('/live', async () => {
    return { status: 'alive', timestamp: new Date().toISOString() };
  });
};
