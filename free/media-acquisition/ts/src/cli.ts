#!/usr/bin/env node
/**
 * Media Acquisition CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '@media-relay/plugin-utils';
import { loadConfig, loadEnvFile } from './config.js';
import { createAcquisitionContext, type AcquisitionContext, type ContextOptions } from './context.js';
import { canonicalizeUrl, fingerprint } from './fingerprint.js';
import { createDefaultRegistry } from './plugins/index.js';
import { MediaKindSchema, QuotaTierSchema } from './schemas.js';
import { isTerminalStatus } from './state-machine.js';
import type { QuotaStatus, TaskSnapshot } from './types.js';

loadEnvFile();

const program = new Command();

program
  .name('media-acquisition')
  .description('Fetch, deduplicate and store media from supported sources')
  .version('1.0.0');

async function withContext<T>(run: (context: AcquisitionContext) => Promise<T>, options?: ContextOptions): Promise<T> {
  const context = await createAcquisitionContext(loadConfig(), { initialize: false, ...options });
  try {
    return await run(context);
  } finally {
    await context.close();
  }
}

function fail(spinner: Ora | null, label: string, error: unknown): never {
  if (spinner) spinner.fail(label);
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
}

function printQuota(status: QuotaStatus): void {
  const ratio = status.limit > 0 ? status.used / status.limit : 1;
  const colour = ratio >= 0.9 ? chalk.red : ratio >= 0.7 ? chalk.yellow : chalk.green;
  console.log(`User:      ${status.userId}`);
  console.log(`Tier:      ${status.tier}`);
  console.log(`Used:      ${colour(`${status.used.toFixed(2)} / ${status.limit} MB`)}`);
  console.log(`Remaining: ${status.remaining.toFixed(2)} MB`);
  console.log(`Resets at: ${status.resetAt.toISOString()}`);
  console.log(`Lifetime:  ${status.totalDownloads} downloads, ${(status.totalBytes / (1024 * 1024)).toFixed(2)} MB`);
}

function printTask(snapshot: TaskSnapshot): void {
  console.log(`Task:      ${snapshot.id}`);
  console.log(`Status:    ${snapshot.status}`);
  console.log(`Progress:  ${snapshot.progress}%`);
  if (snapshot.fingerprint) console.log(`Hash:      ${snapshot.fingerprint}`);
  if (snapshot.result) {
    console.log(`Title:     ${snapshot.result.metadata.title}`);
    console.log(`Object:    ${snapshot.result.objectKey}`);
    console.log(`Size:      ${snapshot.result.sizeBytes} bytes`);
    console.log(`URL:       ${snapshot.result.url}`);
    console.log(`Cached:    ${snapshot.result.cacheHit ? 'yes' : 'no'}`);
  }
  if (snapshot.error) {
    console.log(chalk.red(`Error:     [${snapshot.error.kind}] ${snapshot.error.message}`));
  }
}

program
  .command('init')
  .description('Create database tables and verify the storage bucket')
  .action(async () => {
    const spinner = ora('Initializing media acquisition').start();
    try {
      await withContext(async () => undefined, { initialize: true });
      spinner.succeed('Database schema and storage initialized');
    } catch (error) {
      fail(spinner, 'Initialization failed', error);
    }
  });

program
  .command('server')
  .description('Start HTTP API server')
  .action(async () => {
    console.log(chalk.bold('Starting Media Acquisition Server...\n'));
    try {
      const { MediaAcquisitionServer } = await import('./server.js');
      const config = loadConfig();
      const context = await createAcquisitionContext(config);
      const server = new MediaAcquisitionServer(config, context);
      await server.initialize();
      await server.start();

      console.log(chalk.green(`✓ Server running on port ${config.port}`));

      process.on('SIGINT', () => {
        console.log(chalk.yellow('\nShutting down...'));
        server
          .stop()
          .then(() => context.close())
          .then(() => process.exit(0))
          .catch((error) => fail(null, 'Shutdown failed', error));
      });
    } catch (error) {
      console.error(chalk.red('Failed to start server:'), errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('worker')
  .description('Start a queue worker')
  .action(async () => {
    console.log(chalk.bold('Starting Media Acquisition Worker...\n'));
    try {
      const { startWorker } = await import('./worker.js');
      const config = loadConfig();
      const stop = await startWorker(config);

      console.log(chalk.green(`✓ Worker consuming ${config.queue_name} (concurrency ${config.worker_concurrency})`));

      process.on('SIGINT', () => {
        console.log(chalk.yellow('\nShutting down...'));
        stop()
          .then(() => process.exit(0))
          .catch((error) => fail(null, 'Shutdown failed', error));
      });
    } catch (error) {
      console.error(chalk.red('Failed to start worker:'), errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('submit <url>')
  .description('Submit an acquisition and wait for it to finish')
  .requiredOption('-u, --user <userId>', 'User the download is charged to')
  .option('-k, --kind <kind>', 'Media kind: video, audio, image, document', 'video')
  .option('-q, --quality <height>', 'Maximum video height, e.g. 720')
  .option('-f, --force', 'Skip the cache and fetch again', false)
  .option('--no-wait', 'Print the task id and return immediately')
  .action(async (url: string, options: { user: string; kind: string; quality?: string; force: boolean; wait: boolean }) => {
    const spinner = ora(`Submitting ${url}`).start();
    try {
      const mediaKind = MediaKindSchema.parse(options.kind);
      const quality = options.quality === undefined ? undefined : parseInt(options.quality, 10);

      const snapshot = await withContext(async (context) => {
        const handle = await context.tasks.submit({
          url,
          userId: options.user,
          mediaKind,
          options: { forceRefresh: options.force, quality },
        });
        if (!options.wait) {
          return handle.status();
        }

        spinner.text = `Task ${handle.id} queued`;
        for (;;) {
          const current = await handle.status();
          spinner.text = `Task ${handle.id}: ${current.status} (${current.progress}%)`;
          if (isTerminalStatus(current.status)) {
            return current;
          }
          await sleep(context.config.task_poll_interval_ms);
        }
      });

      if (snapshot.status === 'failed') {
        spinner.fail(`Task ${snapshot.id} failed`);
        printTask(snapshot);
        process.exit(1);
      }

      spinner.succeed(`Task ${snapshot.id} ${snapshot.status}`);
      printTask(snapshot);
    } catch (error) {
      fail(spinner, 'Submission failed', error);
    }
  });

program
  .command('batch <urls...>')
  .description('Submit several URLs for one user without waiting')
  .requiredOption('-u, --user <userId>', 'User the downloads are charged to')
  .option('-k, --kind <kind>', 'Media kind: video, audio, image, document', 'video')
  .action(async (urls: string[], options: { user: string; kind: string }) => {
    const spinner = ora(`Submitting ${urls.length} URLs`).start();
    try {
      const mediaKind = MediaKindSchema.parse(options.kind);
      const snapshots = await withContext(async (context) => {
        const submitted: TaskSnapshot[] = [];
        for (const url of urls) {
          const handle = await context.tasks.submit({ url, userId: options.user, mediaKind });
          submitted.push(await handle.status());
        }
        return submitted;
      });

      spinner.succeed(`${snapshots.length} tasks queued`);
      for (const [index, snapshot] of snapshots.entries()) {
        console.log(`${chalk.cyan(snapshot.id)}  ${snapshot.status.padEnd(10)} ${urls[index] ?? ''}`);
      }
    } catch (error) {
      fail(spinner, 'Batch submission failed', error);
    }
  });

program
  .command('status <taskId>')
  .description('Show a task')
  .action(async (taskId: string) => {
    try {
      const snapshot = await withContext(async (context) => {
        const handle = await context.tasks.get(taskId);
        return handle ? handle.status() : null;
      });
      if (!snapshot) {
        console.log(chalk.yellow(`Task ${taskId} not found`));
        process.exit(1);
      }
      printTask(snapshot);
    } catch (error) {
      fail(null, 'Failed to load task', error);
    }
  });

program
  .command('quota <userId>')
  .description('Show a user\'s daily quota')
  .action(async (userId: string) => {
    try {
      const status = await withContext((context) => context.ledger.checkAndMaybeReset(userId));
      printQuota(status);
    } catch (error) {
      fail(null, 'Failed to load quota', error);
    }
  });

program
  .command('set-tier <userId> <tier>')
  .description('Change a user\'s tier (free, premium)')
  .action(async (userId: string, tier: string) => {
    const spinner = ora(`Setting ${userId} to ${tier}`).start();
    try {
      const parsed = QuotaTierSchema.parse(tier);
      const status = await withContext((context) => context.ledger.setTier(userId, parsed));
      spinner.succeed(`${userId} is now ${status.tier}`);
      printQuota(status);
    } catch (error) {
      fail(spinner, 'Tier change failed', error);
    }
  });

program
  .command('plugins')
  .description('List source plugins')
  .action(() => {
    try {
      const registry = createDefaultRegistry(loadConfig());
      const descriptors = registry.list();
      console.log(chalk.bold(`\n${descriptors.length} plugins (highest priority first):\n`));
      for (const descriptor of descriptors) {
        console.log(`${chalk.cyan(descriptor.name)} v${descriptor.version} (priority ${descriptor.priority})`);
        console.log(`   ${descriptor.description}`);
        console.log(`   Kinds:   ${descriptor.supportedKinds.join(', ')}`);
        if (descriptor.supportedDomains.length > 0) {
          console.log(`   Domains: ${descriptor.supportedDomains.join(', ')}`);
        }
        console.log('');
      }
    } catch (error) {
      fail(null, 'Failed to list plugins', error);
    }
  });

program
  .command('objects [prefix]')
  .description('List stored objects, optionally under a key prefix such as video/2026/')
  .action(async (prefix?: string) => {
    try {
      const objects = await withContext((context) => context.store.list(prefix));
      for (const object of objects) {
        console.log(`${object.lastModified.toISOString()}  ${String(object.size).padStart(12)}  ${object.key}`);
      }
      console.log(chalk.gray(`\n${objects.length} objects`));
    } catch (error) {
      fail(null, 'Failed to list objects', error);
    }
  });

program
  .command('cleanup')
  .description('Delete stored objects older than a number of days')
  .option('-d, --days <days>', 'Maximum object age in days', '30')
  .action(async (options: { days: string }) => {
    const days = Number(options.days);
    const spinner = ora(`Removing objects older than ${options.days} days`).start();
    try {
      const removed = await withContext((context) => context.store.cleanupExpired(days));
      spinner.succeed(`${removed} objects removed`);
    } catch (error) {
      fail(spinner, 'Cleanup failed', error);
    }
  });

program
  .command('fingerprint <url>')
  .description('Print the canonical form and fingerprint of a URL')
  .action((url: string) => {
    try {
      console.log(`Canonical:   ${canonicalizeUrl(url)}`);
      console.log(`Fingerprint: ${fingerprint(url)}`);
    } catch (error) {
      fail(null, 'Invalid URL', error);
    }
  });

program
  .command('rate-limit-reset <key>')
  .description('Clear a rate-limit window, e.g. user:alice or ip:10.0.0.1')
  .action(async (key: string) => {
    const spinner = ora(`Clearing ${key}`).start();
    try {
      await withContext((context) => context.rateLimiter.reset(key));
      spinner.succeed(`Rate limit window cleared for ${key}`);
    } catch (error) {
      fail(spinner, 'Reset failed', error);
    }
  });

program.parseAsync().catch((error) => fail(null, 'Command failed', error));
