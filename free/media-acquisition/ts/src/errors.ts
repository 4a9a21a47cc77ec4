/**
 * Media Acquisition Errors
 *
 * Every failure the pipeline can report carries a `kind`. Components throw
 * these classes; the orchestrator turns them into `AcquisitionOutcome`
 * values at its boundary so callers branch on the kind instead of catching.
 */

import type { AcquisitionResult } from './types.js';

export type AcquisitionErrorKind =
  | 'validation'
  | 'no_handler'
  | 'quota_exceeded'
  | 'metadata_extraction'
  | 'fetch'
  | 'persist'
  | 'not_found'
  | 'rate_limited'
  | 'compliance'
  | 'configuration'
  | 'internal';

export class AcquisitionError extends Error {
  readonly kind: AcquisitionErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: AcquisitionErrorKind, message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.details = options.details;
  }
}

export class ValidationError extends AcquisitionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation', message, { details });
  }
}

export class NoHandlerError extends AcquisitionError {
  constructor(url: string) {
    super('no_handler', `No plugin can handle ${url}`, { details: { url } });
  }
}

export class QuotaExceededError extends AcquisitionError {
  constructor(userId: string, used: number, limit: number, requested?: number) {
    super(
      'quota_exceeded',
      requested === undefined
        ? `Daily quota exhausted for user ${userId} (${formatUnits(used)}/${formatUnits(limit)} MB)`
        : `Request of ${formatUnits(requested)} MB exceeds the remaining daily quota for user ${userId} (${formatUnits(used)}/${formatUnits(limit)} MB)`,
      { details: { userId, used, limit, requested } }
    );
  }
}

export class MetadataExtractionError extends AcquisitionError {
  constructor(message: string, cause?: unknown) {
    super('metadata_extraction', message, { cause });
  }
}

export class FetchError extends AcquisitionError {
  constructor(message: string, cause?: unknown) {
    super('fetch', message, { cause });
  }
}

export class PersistError extends AcquisitionError {
  constructor(message: string, cause?: unknown) {
    super('persist', message, { cause });
  }
}

export class NotFoundError extends AcquisitionError {
  constructor(what: string, id: string) {
    super('not_found', `${what} ${id} not found`, { details: { id } });
  }
}

export class RateLimitedError extends AcquisitionError {
  readonly retryAfterSeconds: number;

  constructor(key: string, retryAfterSeconds: number, message = 'Too many requests') {
    super('rate_limited', message, { details: { key, retryAfterSeconds } });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ComplianceError extends AcquisitionError {
  constructor(plugin: string, title: string) {
    super('compliance', `Content rejected by ${plugin} screening: ${title}`, { details: { plugin, title } });
  }
}

export class ConfigurationError extends AcquisitionError {
  constructor(message: string, cause?: unknown) {
    super('configuration', message, { cause });
  }
}

function formatUnits(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

// =============================================================================
// Outcomes
// =============================================================================

export interface AcquisitionFailure {
  kind: AcquisitionErrorKind;
  message: string;
  stage: string;
  /** False when repeating the same request cannot succeed until something else changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
}

export type AcquisitionOutcome =
  | { ok: true; result: AcquisitionResult }
  | { ok: false; error: AcquisitionFailure };

const PERMANENT_KINDS: ReadonlySet<AcquisitionErrorKind> = new Set([
  'validation',
  'no_handler',
  'quota_exceeded',
  'rate_limited',
  'compliance',
  'configuration',
]);

export function isRetryableKind(kind: AcquisitionErrorKind): boolean {
  return !PERMANENT_KINDS.has(kind);
}

export function toFailure(error: unknown, stage: string): AcquisitionFailure {
  if (error instanceof AcquisitionError) {
    return { kind: error.kind, message: error.message, stage, retryable: isRetryableKind(error.kind), details: error.details };
  }
  return { kind: 'internal', message: error instanceof Error ? error.message : String(error), stage, retryable: true };
}

export function httpStatusForKind(kind: string): number {
  switch (kind) {
    case 'validation':
      return 400;
    case 'not_found':
      return 404;
    case 'no_handler':
      return 422;
    case 'compliance':
      return 451;
    case 'quota_exceeded':
    case 'rate_limited':
      return 429;
    default:
      return 500;
  }
}
