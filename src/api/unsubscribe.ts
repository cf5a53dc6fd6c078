import { FastifyPluginAsync } from 'fastify';
import { UNSUBSCRIBE_BODY_LIMIT, unsubscribeRequestSchema } from '../schemas/unsubscribe';
import { SweepService } from '../services/sweep-service';
import { handleError, ValidationError } from '../types/errors';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('UnsubscribeRoutes');

export interface UnsubscribeRouteOptions {
  service: SweepService;
}

export const unsubscribeRoutes: FastifyPluginAsync<UnsubscribeRouteOptions> = async (fastify, { service }) => {
  // Act on a filled-in selection file
  fastify.post('/', { bodyLimit: UNSUBSCRIBE_BODY_LIMIT }, async (request, reply) => {
    try {
      const bodyResult = unsubscribeRequestSchema.safeParse(request.body ?? {});
      if (!bodyResult.success) {
        throw new ValidationError('Invalid request body', bodyResult.error.errors);
      }

      const result = await service.runUnsubscribe(bodyResult.data.csv);
      return {
        success: true,
        outcomes: result.outcomes.map(outcome => ({
          ...outcome,
          attemptedAt: outcome.attemptedAt.toISOString()
        })),
        summary: {
          attempted: result.outcomes.length,
          succeeded: result.outcomes.filter(outcome => outcome.result === 'Success').length,
          skipped: result.skipped,
          cancelled: result.cancelled
        }
      };
    } catch (error) {
      logger.error({ error }, 'Unsubscribe run failed');
      const apiError = handleError(error);
      return reply.status(apiError.statusCode).send(apiError);
    }
  });
};
