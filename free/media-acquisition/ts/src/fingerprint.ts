/**
 * Request fingerprinting and content hashing
 *
 * A fingerprint is the SHA-256 hex digest of the canonical form of a URL.
 * Two URLs that differ only in case of scheme/host, a `www.` prefix, a
 * default port, a fragment, tracking parameters, query order or a trailing
 * slash share a fingerprint.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { ValidationError } from './errors.js';

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'dclid',
  'igshid',
  'mc_cid',
  'mc_eid',
  'ref_src',
  'si',
  'feature',
]);

const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Parses and normalizes a user-supplied URL. Throws ValidationError for
 * anything that is not an absolute http(s) URL.
 */
export function canonicalizeUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ValidationError(`Invalid URL: ${trimmed}`, { url: trimmed });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`, { url: trimmed });
  }

  // WHATWG URL already lowercases the scheme and host
  url.hostname = url.hostname.replace(/^www\./, '');
  if (url.port === DEFAULT_PORTS[url.protocol]) {
    url.port = '';
  }
  url.hash = '';
  url.username = '';
  url.password = '';

  const params = [...url.searchParams.entries()]
    .filter(([name]) => !name.toLowerCase().startsWith('utm_') && !TRACKING_PARAMS.has(name.toLowerCase()))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  url.search = '';
  for (const [name, value] of params) {
    url.searchParams.append(name, value);
  }

  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }

  return url.toString();
}

export function fingerprint(rawUrl: string): string {
  return sha256Hex(canonicalizeUrl(rawUrl));
}

/**
 * Streams a file through SHA-256.
 */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = createReadStream(filePath);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}
