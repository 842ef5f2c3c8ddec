import type { RatedNewsItem } from '../news/schema.js';

/**
 * One persisted row: publication date, title, summary, url, rating.
 */
export type StoreRow = [publicationDate: string, title: string, summary: string, url: string, rating: number];

/**
 * Append-only record of published items, queried only by url.
 */
export interface NewsStore {
  readonly kind: string;
  listUrls(): Promise<string[]>;
  appendRow(row: StoreRow): Promise<void>;
}

export function toStoreRow(item: RatedNewsItem): StoreRow {
  return [item.publication_date, item.title, item.summary, item.url, item.rating];
}
