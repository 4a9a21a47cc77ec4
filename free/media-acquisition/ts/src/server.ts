/**
 * Media Acquisition API Server
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import {
  createAuthHook,
  createLogger,
  createRateLimitHook,
  errorMessage,
  type SlidingWindowRateLimiter,
} from '@media-relay/plugin-utils';
import type { MediaCatalog } from './catalog.js';
import { AcquisitionError, RateLimitedError, httpStatusForKind } from './errors.js';
import { LocalObjectStore, type ObjectStore } from './object-store.js';
import type { PluginRegistry } from './plugins/registry.js';
import type { QuotaLedger } from './quota.js';
import {
  AcquisitionBodySchema,
  BatchAcquisitionBodySchema,
  SetTierSchema,
  formatZodError,
  type AcquisitionBodyInput,
} from './schemas.js';
import type { TaskQueue } from './tasks.js';
import type { AcquisitionRequest, MediaAcquisitionConfig, QuotaStatus, TaskSnapshot } from './types.js';

const logger = createLogger('media-acquisition:server');

const FILES_PREFIX = '/files/';

export interface ServerDependencies {
  tasks: TaskQueue;
  ledger: QuotaLedger;
  registry: PluginRegistry;
  rateLimiter: SlidingWindowRateLimiter;
  store: ObjectStore;
  catalog?: MediaCatalog;
  /** Backend health checks for /ready. */
  ping?: () => Promise<Record<string, boolean>>;
}

function toTaskResponse(snapshot: TaskSnapshot) {
  return {
    task_id: snapshot.id,
    status: snapshot.status,
    progress: snapshot.progress,
    fingerprint: snapshot.fingerprint,
    result: snapshot.result,
    error: snapshot.error,
    created_at: snapshot.createdAt,
    updated_at: snapshot.updatedAt,
  };
}

function toAcquisitionRequest(url: string, body: Omit<AcquisitionBodyInput, 'url'>): AcquisitionRequest {
  return {
    url,
    userId: body.user_id,
    mediaKind: body.media_kind,
    options: body.options && {
      forceRefresh: body.options.force_refresh,
      quality: body.options.quality,
      format: body.options.format,
    },
  };
}

function toQuotaResponse(status: QuotaStatus) {
  return {
    user_id: status.userId,
    tier: status.tier,
    used_mb: status.used,
    limit_mb: status.limit,
    remaining_mb: status.remaining,
    reset_at: status.resetAt.toISOString(),
    total_downloads: status.totalDownloads,
    total_bytes: status.totalBytes,
  };
}

// ============================================================================
// Server
// ============================================================================

export class MediaAcquisitionServer {
  private fastify: FastifyInstance;
  private config: MediaAcquisitionConfig;
  private deps: ServerDependencies;

  constructor(config: MediaAcquisitionConfig, deps: ServerDependencies) {
    this.config = config;
    this.deps = deps;
    this.fastify = Fastify({ logger: false });
  }

  /** The underlying Fastify instance, for `inject()` in tests. */
  get app(): FastifyInstance {
    return this.fastify;
  }

  async initialize(): Promise<void> {
    await this.fastify.register(cors);

    const rateLimitHook = createRateLimitHook(this.deps.rateLimiter, this.config.rate_limit_global);
    this.fastify.addHook('preHandler', (request, reply) => rateLimitHook(request, reply));

    if (this.config.api_key) {
      const authHook = createAuthHook(this.config.api_key, { publicPrefixes: [FILES_PREFIX] });
      this.fastify.addHook('preHandler', (request, reply) => authHook(request, reply));
    }

    this.registerRoutes();
    logger.info('Server initialized');
  }

  private registerRoutes(): void {
    this.fastify.get('/health', async () => {
      return { status: 'ok', plugin: 'media-acquisition', timestamp: new Date().toISOString() };
    });

    this.fastify.get('/ready', async (_request, reply) => {
      const checks = this.deps.ping ? await this.deps.ping() : {};
      const ready = Object.values(checks).every(Boolean);
      return reply.status(ready ? 200 : 503).send({
        status: ready ? 'ready' : 'not_ready',
        checks,
        timestamp: new Date().toISOString(),
      });
    });

    // -----------------------------------------------------------------------
    // Acquisitions and tasks
    // -----------------------------------------------------------------------

    this.fastify.post('/v1/acquisitions', async (request, reply) => {
      try {
        const body = AcquisitionBodySchema.parse(request.body);

        const decision = await this.deps.rateLimiter.consume(`user:${body.user_id}`, this.config.rate_limit_per_user);
        if (!decision.allowed) {
          logger.warn('Per-user rate limit exceeded', { userId: body.user_id });
          throw new RateLimitedError(`user:${body.user_id}`, decision.retryAfterSeconds, 'Too many acquisition requests');
        }

        const handle = await this.deps.tasks.submit(toAcquisitionRequest(body.url, body));
        const snapshot = await handle.status();

        return reply.status(202).send({
          task_id: snapshot.id,
          fingerprint: snapshot.fingerprint,
          status: snapshot.status,
        });
      } catch (error) {
        return this.handleError(reply, error, 'Submit acquisition');
      }
    });

    // Each URL counts against the per-user limit; URLs past it are reported, not queued
    this.fastify.post('/v1/acquisitions/batch', async (request, reply) => {
      try {
        const body = BatchAcquisitionBodySchema.parse(request.body);
        const key = `user:${body.user_id}`;
        const tasks: Array<Record<string, unknown>> = [];
        let submitted = 0;
        let retryAfterSeconds = 0;

        for (const url of body.urls) {
          const decision = await this.deps.rateLimiter.consume(key, this.config.rate_limit_per_user);
          if (!decision.allowed) {
            retryAfterSeconds = Math.max(retryAfterSeconds, decision.retryAfterSeconds);
            tasks.push({ url, error: 'Too many acquisition requests', kind: 'rate_limited' });
            continue;
          }
          const snapshot = await (await this.deps.tasks.submit(toAcquisitionRequest(url, body))).status();
          tasks.push({ url, task_id: snapshot.id, fingerprint: snapshot.fingerprint, status: snapshot.status });
          submitted++;
        }

        if (submitted === 0) {
          logger.warn('Per-user rate limit exceeded for a whole batch', { userId: body.user_id, urls: body.urls.length });
          throw new RateLimitedError(key, retryAfterSeconds, 'Too many acquisition requests');
        }
        logger.info('Batch submitted', { userId: body.user_id, submitted, rejected: body.urls.length - submitted });
        return reply.status(202).send({ submitted, rejected: body.urls.length - submitted, tasks });
      } catch (error) {
        return this.handleError(reply, error, 'Submit batch');
      }
    });

    this.fastify.get('/v1/tasks/:id', async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      try {
        const handle = await this.deps.tasks.get(request.params.id);
        if (!handle) {
          return reply.status(404).send({ error: 'Task not found' });
        }
        return toTaskResponse(await handle.status());
      } catch (error) {
        return this.handleError(reply, error, 'Get task');
      }
    });

    this.fastify.delete('/v1/tasks/:id', async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      try {
        const handle = await this.deps.tasks.get(request.params.id);
        if (!handle) {
          return reply.status(404).send({ error: 'Task not found' });
        }
        if (!(await handle.cancel())) {
          const snapshot = await handle.status();
          return reply.status(409).send({ error: 'Task has already started', status: snapshot.status });
        }
        return { cancelled: true };
      } catch (error) {
        return this.handleError(reply, error, 'Cancel task');
      }
    });

    // -----------------------------------------------------------------------
    // Quotas
    // -----------------------------------------------------------------------

    this.fastify.get('/v1/quota/:userId', async (request: FastifyRequest<{ Params: { userId: string } }>, reply: FastifyReply) => {
      try {
        return toQuotaResponse(await this.deps.ledger.checkAndMaybeReset(request.params.userId));
      } catch (error) {
        return this.handleError(reply, error, 'Get quota');
      }
    });

    this.fastify.put('/v1/quota/:userId/tier', async (request: FastifyRequest<{ Params: { userId: string } }>, reply: FastifyReply) => {
      try {
        const { tier } = SetTierSchema.parse(request.body);
        return toQuotaResponse(await this.deps.ledger.setTier(request.params.userId, tier));
      } catch (error) {
        return this.handleError(reply, error, 'Set tier');
      }
    });

    // -----------------------------------------------------------------------
    // Plugins and catalog
    // -----------------------------------------------------------------------

    this.fastify.get('/v1/plugins', async () => {
      return { plugins: this.deps.registry.list() };
    });

    const catalog = this.deps.catalog;
    if (catalog) {
      this.fastify.get(
        '/v1/users/:userId/media',
        async (request: FastifyRequest<{ Params: { userId: string }; Querystring: { limit?: string } }>, reply: FastifyReply) => {
          const limit = Math.min(Math.max(parseInt(request.query.limit ?? '50', 10) || 50, 1), 500);
          try {
            return { items: await catalog.listMediaItems(request.params.userId, limit) };
          } catch (error) {
            return this.handleError(reply, error, 'List media');
          }
        }
      );
    }

    // -----------------------------------------------------------------------
    // Signed downloads from the local object store
    // -----------------------------------------------------------------------

    const store = this.deps.store;
    if (store instanceof LocalObjectStore) {
      this.fastify.get(
        `${FILES_PREFIX}*`,
        async (request: FastifyRequest<{ Params: { '*': string }; Querystring: { expires?: string; signature?: string } }>, reply: FastifyReply) => {
          const key = request.params['*'];
          const expires = Number(request.query.expires);
          const signature = request.query.signature ?? '';
          try {
            if (!Number.isInteger(expires) || !store.verifySignedUrl(key, expires, signature)) {
              return reply.status(403).send({ error: 'Invalid or expired signature' });
            }
            const stream = await store.openReadStream(key);
            if (!stream) {
              return reply.status(404).send({ error: 'Object not found' });
            }
            return reply.type('application/octet-stream').send(stream);
          } catch (error) {
            return this.handleError(reply, error, 'Serve object');
          }
        }
      );
    }
  }

  private handleError(reply: FastifyReply, error: unknown, action: string) {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: formatZodError(error), kind: 'validation' });
    }

    if (error instanceof RateLimitedError) {
      reply.header('Retry-After', String(error.retryAfterSeconds));
      return reply.status(429).send({ error: error.message, kind: error.kind, retry_after_seconds: error.retryAfterSeconds });
    }

    if (error instanceof AcquisitionError) {
      const status = httpStatusForKind(error.kind);
      if (status >= 500) {
        logger.error(`${action} failed`, { kind: error.kind, error: error.message });
      }
      return reply.status(status).send({ error: error.message, kind: error.kind });
    }

    const message = errorMessage(error);
    logger.error(`${action} failed`, { error: message });
    return reply.status(500).send({ error: message, kind: 'internal' });
  }

  async start(): Promise<void> {
    try {
      await this.fastify.listen({ port: this.config.port, host: this.config.host });
      logger.info(`Server listening on port ${this.config.port}`);
    } catch (error) {
      logger.error('Failed to start server', { error: errorMessage(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    logger.info('Server stopped');
  }
}
