/**
 * Security Middleware and Utilities
 * Authentication and rate limiting hooks for media-relay plugin servers
 */

import { timingSafeEqual } from 'node:crypto';
import { createLogger } from './logger.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import type { RateLimitRule } from './types.js';

const logger = createLogger('security');

type Headers = Record<string, string | string[] | undefined>;

/** The slice of a Fastify request the hooks read. */
export interface HookRequest {
  url: string;
  ip: string;
  headers: Headers;
}

/** The slice of a Fastify reply the hooks write. */
export interface HookReply {
  status(code: number): { send(body: unknown): unknown };
  header(name: string, value: string): unknown;
}

const UNAUTHENTICATED_PATHS = new Set(['/health', '/ready', '/live']);

/**
 * API Key authentication result
 */
export interface AuthResult {
  authenticated: boolean;
  error?: string;
}

/**
 * Validate an API key. With no key configured every request is allowed (dev mode).
 */
export function validateApiKey(providedKey: string | undefined, validKey: string | undefined): AuthResult {
  if (!validKey) {
    return { authenticated: true };
  }

  if (!providedKey) {
    return { authenticated: false, error: 'API key required' };
  }

  const provided = Buffer.from(providedKey);
  const expected = Buffer.from(validKey);
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    return { authenticated: false, error: 'Invalid API key' };
  }

  return { authenticated: true };
}

/**
 * Extract API key from request headers
 * Supports: Authorization: Bearer <key>, X-API-Key: <key>
 */
export function extractApiKey(headers: Headers): string | undefined {
  const authHeader = headers['authorization'];
  if (authHeader) {
    const auth = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (auth.startsWith('Bearer ')) {
      return auth.slice(7);
    }
  }

  const apiKeyHeader = headers['x-api-key'];
  if (apiKeyHeader) {
    return Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
  }

  return undefined;
}

/**
 * Create Fastify authentication hook
 * Usage: app.addHook('preHandler', (req, reply) => authHook(req, reply))
 */
export function createAuthHook(apiKey: string | undefined, options: { publicPrefixes?: string[] } = {}) {
  const publicPrefixes = options.publicPrefixes ?? [];
  return async (request: HookRequest, reply: HookReply): Promise<unknown> => {
    const path = request.url.split('?')[0];
    if (UNAUTHENTICATED_PATHS.has(path) || publicPrefixes.some((prefix) => path.startsWith(prefix))) {
      return undefined;
    }

    const result = validateApiKey(extractApiKey(request.headers), apiKey);
    if (!result.authenticated) {
      logger.warn('Authentication failed', { error: result.error, ip: request.ip });
      return reply.status(401).send({ error: result.error });
    }
    return undefined;
  };
}

/**
 * Create Fastify rate limiting hook keyed by client IP.
 * Usage: app.addHook('preHandler', (req, reply) => rateLimitHook(req, reply))
 */
export function createRateLimitHook(limiter: SlidingWindowRateLimiter, rule: RateLimitRule, scope = 'ip') {
  return async (request: HookRequest, reply: HookReply): Promise<unknown> => {
    if (UNAUTHENTICATED_PATHS.has(request.url.split('?')[0])) {
      return undefined;
    }

    const key = `${scope}:${request.ip || 'unknown'}`;
    const decision = await limiter.consume(key, rule);

    reply.header('X-RateLimit-Limit', String(decision.limit));
    reply.header('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      logger.warn('Rate limit exceeded', { ip: request.ip });
      reply.header('Retry-After', String(decision.retryAfterSeconds));
      return reply.status(429).send({ error: 'Too many requests', kind: 'rate_limited' });
    }
    return undefined;
  };
}
