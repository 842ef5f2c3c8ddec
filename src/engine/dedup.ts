import type { NewsItem } from '../news/schema.js';
import type { NewsStore } from '../store/adapter.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

// Exact keys; anything starting with utm_ is dropped as well.
const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'yclid',
  'igshid',
  'mc_cid',
  'mc_eid',
  '_hsenc',
  '_hsmi',
  'ref',
  'ref_src',
]);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

/**
 * Canonical form of an article url: lowercase host without `www.`, no
 * fragment, no trailing slash, tracking parameters removed and the remaining
 * query sorted by key. Path case is kept. Unparseable input is only trimmed.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  const host = url.host.replace(/^www\./, '');
  const query = new URLSearchParams([...url.searchParams].filter(([key]) => !isTrackingParam(key)));
  query.sort();
  const search = query.toString();
  const pathname = url.pathname.replace(/\/+$/, '');

  return `${url.protocol}//${host}${pathname}${search ? `?${search}` : ''}`;
}

export interface FilterOptions {
  /** Compare urls through `normalizeUrl` instead of as exact strings. */
  normalize?: boolean;
}

/**
 * Candidates whose url is not in `existingUrls`, in candidate order.
 */
export function filterNewItems<T extends NewsItem>(
  candidates: readonly T[],
  existingUrls: ReadonlySet<string>,
  options: FilterOptions = {},
): T[] {
  if (!options.normalize) {
    return candidates.filter((item) => !existingUrls.has(item.url));
  }
  const existing = new Set([...existingUrls].map(normalizeUrl));
  return candidates.filter((item) => !existing.has(normalizeUrl(item.url)));
}

/**
 * Urls already recorded in the store. A failed read yields the empty set so the
 * run goes on and may re-send items rather than drop them.
 */
export async function fetchExistingUrls(store: NewsStore): Promise<Set<string>> {
  logger.info('Fetching existing URLs from the store');
  try {
    const urls = new Set(await store.listUrls());
    logger.info({ count: urls.size }, 'Existing URLs loaded');
    return urls;
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Could not read existing URLs, treating the store as empty');
    return new Set();
  }
}
