import { buildServer } from './server';
import { env } from './config/env';
import { closeDatabase } from './config/drizzle';
import { logger } from './utils/logger';

async function main() {
  try {
    const server = await buildServer();

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      try {
        await server.close();
        await closeDatabase();
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    await server.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logger.info(`Server listening on http://${env.HOST}:${env.PORT}`);
    logger.info(`API documentation available at http://${env.HOST}:${env.PORT}/docs`);
    logger.info(`Health check available at http://${env.HOST}:${env.PORT}/health`);
  } catch (error) {
    logger.error(error);
    process.exit(1);
  }
}

void main();
