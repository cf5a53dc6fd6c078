import Fastify, { FastifyInstance } from 'fastify';
import { healthRoutes } from './api/health';
import { scanRoutes } from './api/scans';
import { unsubscribeRoutes } from './api/unsubscribe';
import { SweepService } from './services/sweep-service';

export interface AppOptions {
  scanRateLimitMax?: number;
}

export async function buildApp(service: SweepService, options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { level: process.env.LOG_LEVEL || 'info' },
    trustProxy: true
  });

  await fastify.register(healthRoutes, { prefix: '/health', service });
  await fastify.register(scanRoutes, { prefix: '/api/scans', service, rateLimitMax: options.scanRateLimitMax });
  await fastify.register(unsubscribeRoutes, { prefix: '/api/unsubscribe', service });

  return fastify;
}
