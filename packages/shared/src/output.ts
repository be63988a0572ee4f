/**
 * Record Output
 *
 * Persistence collaborators store each record as a single-element JSON
 * array keyed by the fund's slug.
 */

import type { FundRecord } from './types';

export interface SerializedRecord {
  slug: string;
  json: string;
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    // Not an absolute URL; treat it as a path
    return url.split(/[?#]/)[0];
  }
}

/**
 * Last non-empty path segment of the URL, or "unknown"
 */
export function fundSlugFromUrl(url: string): string {
  const segments = pathOf(url)
    .split('/')
    .filter((segment) => segment !== '');
  return segments.pop() ?? 'unknown';
}

export function serializeFundRecord(record: FundRecord): SerializedRecord {
  return {
    slug: fundSlugFromUrl(record.source_url),
    json: JSON.stringify([record], null, 2),
  };
}
