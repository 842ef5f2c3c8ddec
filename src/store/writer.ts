import type { RatedNewsItem } from '../news/schema.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { toStoreRow } from './adapter.js';
import type { NewsStore } from './adapter.js';

export interface WriteReport {
  attempted: number;
  written: number;
  failed?: { url: string; error: string };
}

/**
 * Append one row per item, in order. The first failing row stops the sequence;
 * rows written before it stay.
 */
export async function appendItems(store: NewsStore, items: readonly RatedNewsItem[]): Promise<WriteReport> {
  if (items.length === 0) {
    logger.info('No data to upload, skipping store update');
    return { attempted: 0, written: 0 };
  }

  logger.info({ rows: items.length, store: store.kind }, 'Appending rows to the store');
  let written = 0;
  for (const item of items) {
    try {
      await store.appendRow(toStoreRow(item));
      written++;
      logger.debug({ title: item.title, date: item.publication_date }, 'Row appended');
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ url: item.url, written, error }, 'Store append failed, stopping');
      return { attempted: items.length, written, failed: { url: item.url, error } };
    }
  }

  logger.info({ written }, 'Store update complete');
  return { attempted: items.length, written };
}
