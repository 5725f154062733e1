// Request identity used for caching and single-flight
import { createHash } from 'crypto';
import type { SearchRequest } from '@/types/core';

/** Trimmed, lower-cased, inner whitespace collapsed. */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function requestFingerprint(request: SearchRequest): string {
  return sha256(
    JSON.stringify({
      q: normalizeQuery(request.query),
      max: request.maxResults,
      src: request.includeSources,
    }),
  );
}

/** Cache key of one search fan-out for one query string. */
export function searchKey(query: string, limit: number): string {
  return sha256(`${normalizeQuery(query)}|${limit}`);
}

export function enhancementKey(query: string): string {
  return sha256(normalizeQuery(query));
}

export function fetchKey(url: string): string {
  return sha256(url);
}
