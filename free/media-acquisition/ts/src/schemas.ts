/**
 * Request Validation Schemas
 * Zod schemas for validating API request bodies
 */

import { z } from 'zod';
import { MEDIA_KINDS, QUOTA_TIERS } from './types.js';

export const MediaKindSchema = z.enum(MEDIA_KINDS);

export const QuotaTierSchema = z.enum(QUOTA_TIERS);

export const MAX_BATCH_SIZE = 20;

const MediaUrlSchema = z
  .string()
  .min(1, 'url is required')
  .max(2048)
  .refine((value) => /^https?:\/\//i.test(value) && URL.canParse(value), 'url must be an http(s) URL');

const AcquisitionOptionsSchema = z
  .object({
    force_refresh: z.boolean().optional(),
    quality: z.number().int().positive().optional(),
    format: z.string().max(50).optional(),
  })
  .optional();

// Submit acquisition request schema
export const AcquisitionBodySchema = z.object({
  url: MediaUrlSchema,
  user_id: z.string().trim().min(1, 'user_id is required').max(255),
  media_kind: MediaKindSchema.default('video'),
  options: AcquisitionOptionsSchema,
});

export type AcquisitionBodyInput = z.infer<typeof AcquisitionBodySchema>;

// Batch submission: same options for every URL
export const BatchAcquisitionBodySchema = z.object({
  urls: z.array(MediaUrlSchema).min(1, 'urls must not be empty').max(MAX_BATCH_SIZE),
  user_id: z.string().trim().min(1, 'user_id is required').max(255),
  media_kind: MediaKindSchema.default('video'),
  options: AcquisitionOptionsSchema,
});

export type BatchAcquisitionBodyInput = z.infer<typeof BatchAcquisitionBodySchema>;

export const SetTierSchema = z.object({
  tier: QuotaTierSchema,
});

export type SetTierInput = z.infer<typeof SetTierSchema>;

// Result cache entries are read back from Redis and checked before use
export const MediaInfoSchema = z.object({
  title: z.string().min(1),
  duration: z.number().optional(),
  resolution: z.string().optional(),
  filesize: z.number().optional(),
  uploader: z.string().optional(),
  thumbnail: z.string().optional(),
  mimeType: z.string().optional(),
  webpageUrl: z.string().optional(),
  extra: z.record(z.unknown()).optional(),
});

export const CachedArtifactSchema = z.object({
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  objectKey: z.string().min(1),
  url: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  mediaKind: MediaKindSchema,
  metadata: MediaInfoSchema,
  plugin: z.string(),
  cachedAt: z.string(),
  expiresAt: z.string(),
});

/**
 * Validation helper that formats zod errors nicely
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}
