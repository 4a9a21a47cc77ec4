/**
 * Acquisition Worker
 * BullMQ worker that runs acquisition tasks from the queue
 */

import { createLogger, createRedisConnection, errorMessage } from '@media-relay/plugin-utils';
import { loadConfig, loadEnvFile } from './config.js';
import { createAcquisitionContext } from './context.js';
import { ConfigurationError } from './errors.js';
import { createAcquisitionWorker } from './tasks.js';
import type { MediaAcquisitionConfig } from './types.js';

const logger = createLogger('media-acquisition:worker');

/**
 * Starts a worker and resolves once it is consuming jobs. The returned
 * function stops the worker and releases every connection.
 */
export async function startWorker(config: MediaAcquisitionConfig): Promise<() => Promise<void>> {
  if (config.state_backend !== 'redis') {
    throw new ConfigurationError('The queue worker needs STATE_BACKEND=redis');
  }

  const context = await createAcquisitionContext(config);
  // Workers block on the queue, so their connection must never give up on a command
  const connection = createRedisConnection(config.redis_url, { name: 'worker', maxRetriesPerRequest: null });

  const worker = createAcquisitionWorker(context.orchestrator, connection, {
    queueName: config.queue_name,
    concurrency: config.worker_concurrency,
  });

  worker.on('ready', () => {
    logger.info(`Worker ready and listening for jobs on queue: ${config.queue_name}`);
  });

  worker.on('stalled', (jobId: string) => {
    logger.warn(`Task ${jobId} stalled`);
  });

  logger.info(`Starting worker for queue: ${config.queue_name}`, { concurrency: config.worker_concurrency });

  return async () => {
    logger.info('Shutting down...');
    await worker.close();
    await connection.quit();
    await context.close();
  };
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const stop = await startWorker(config);

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    try {
      await stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    logger.error(`Failed to start worker: ${errorMessage(error)}`);
    process.exit(1);
  });
}
