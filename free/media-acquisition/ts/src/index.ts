/**
 * Media Acquisition Entry Point
 */

import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import { loadConfig, loadEnvFile } from './config.js';
import { createAcquisitionContext } from './context.js';
import { MediaAcquisitionServer } from './server.js';

const logger = createLogger('media-acquisition');

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './fingerprint.js';
export * from './cache.js';
export * from './lease.js';
export * from './quota.js';
export * from './object-store.js';
export * from './catalog.js';
export * from './database.js';
export * from './state-machine.js';
export * from './pipeline.js';
export * from './tasks.js';
export * from './schemas.js';
export * from './context.js';
export * from './server.js';
export * from './plugins/index.js';

async function startServer() {
  logger.info('Starting Media Acquisition Server', { version: '1.0.0' });

  try {
    loadEnvFile();
    const config = loadConfig();
    const context = await createAcquisitionContext(config);

    const server = new MediaAcquisitionServer(config, context);
    await server.initialize();
    await server.start();

    logger.success('Media Acquisition Server started', { port: config.port, storage: config.storage_backend });

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully`);
      try {
        await server.stop();
        await context.close();
        process.exit(0);
      } catch (error) {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start Media Acquisition Server', { error: errorMessage(error) });
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
