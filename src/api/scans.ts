import rateLimit from '@fastify/rate-limit';
import { FastifyPluginAsync } from 'fastify';
import { SweepService } from '../services/sweep-service';
import { handleError, NotFoundError } from '../types/errors';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('ScanRoutes');

export interface ScanRouteOptions {
  service: SweepService;
  // Scans per hour per client
  rateLimitMax?: number;
}

export const scanRoutes: FastifyPluginAsync<ScanRouteOptions> = async (fastify, { service, rateLimitMax = 10 }) => {
  await fastify.register(rateLimit, {
    global: false
  });

  // Run a scan and write the reports
  fastify.post('/', {
    config: {
      rateLimit: {
        max: rateLimitMax,
        timeWindow: '1 hour',
        errorResponseBuilder: () => {
          return {
            error: 'RateLimitExceeded',
            message: 'Too many scan requests. Please try again later.',
            code: 'RATE_LIMIT_EXCEEDED',
            statusCode: 429
          };
        }
      }
    }
  }, async (_, reply) => {
    try {
      const summary = await service.runScan();
      return {
        success: true,
        summary
      };
    } catch (error) {
      logger.error({ error }, 'Scan failed');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });

  // Summary of the most recent scan
  fastify.get('/latest', async (_, reply) => {
    try {
      const summary = service.latest();
      if (!summary) {
        throw new NotFoundError('Scan');
      }
      return summary;
    } catch (error) {
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });
};
