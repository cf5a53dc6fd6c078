import dotenv from 'dotenv';
dotenv.config();

import { buildApp } from './app';
import { FileScannedIdStore, ScannedIdStore } from './db/scanned-ids';
import { RedisScannedIdStore, RedisService } from './db/redis';
import { ImapMailbox } from './services/imap-mailbox';
import { SweepService } from './services/sweep-service';
import { loadTaxonomy } from './services/taxonomy';
import { logger } from './utils/logger';
import { loadConfig, SweeperConfig } from './utils/validation';

async function start() {
  // Validate environment variables
  let config: SweeperConfig;
  try {
    config = loadConfig(process.env);
    logger.info('✅ Environment variables validated');
  } catch (error) {
    logger.error({ error }, '❌ Invalid environment variables');
    process.exit(1);
  }

  let redisService: RedisService | null = null;

  try {
    const taxonomy = loadTaxonomy(config.scan.taxonomyPath);

    let store: ScannedIdStore;
    if (config.dedup.backend === 'redis') {
      redisService = new RedisService(config.dedup.redisUrl);
      await redisService.connect();
      store = new RedisScannedIdStore(redisService.client);
    } else {
      store = new FileScannedIdStore(config.dedup.path);
    }

    const service = new SweepService(config, {
      mailboxFactory: () => ImapMailbox.connect(config.imap),
      store,
      taxonomy
    });

    const fastify = await buildApp(service);

    // Start the server
    const host = config.env === 'production' ? '0.0.0.0' : 'localhost';
    await fastify.listen({ port: config.port, host });

    logger.info(`🚀 Inbox sweeper running on http://${host}:${config.port}`);
    logger.info(`📊 Health check available at http://${host}:${config.port}/health`);

    // Handle graceful shutdown
    const gracefulShutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully`);

      try {
        // Stop an unsubscribe run between rows, then stop accepting requests
        service.cancel();
        await fastify.close();

        if (redisService) {
          await redisService.disconnect();
        }

        logger.info('✅ Graceful shutdown complete');
        process.exit(0);
      } catch (err) {
        logger.error({ error: err }, '❌ Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  } catch (err) {
    logger.error({ error: err }, 'Failed to start');
    if (redisService) {
      await redisService.disconnect().catch((error: unknown) => logger.error({ error }, 'Redis cleanup failed'));
    }
    process.exit(1);
  }
}

void start();
