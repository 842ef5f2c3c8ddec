import type Database from 'better-sqlite3';
import { StoreError, errorMessage } from '../shared/errors.js';
import type { NewsStore, StoreRow } from './adapter.js';

/**
 * Local append-only store in the `news_items` table.
 */
export class SqliteStore implements NewsStore {
  readonly kind = 'sqlite';

  constructor(private readonly db: Database.Database) {}

  async listUrls(): Promise<string[]> {
    try {
      const rows = this.db.prepare('SELECT url FROM news_items ORDER BY id').all() as Array<{ url: string }>;
      return rows.map((r) => r.url);
    } catch (err) {
      throw new StoreError(`Failed to read urls: ${errorMessage(err)}`);
    }
  }

  async appendRow(row: StoreRow): Promise<void> {
    const [publicationDate, title, summary, url, rating] = row;
    try {
      this.db
        .prepare(
          `INSERT INTO news_items (publication_date, title, summary, url, rating)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(publicationDate, title, summary, url, rating);
    } catch (err) {
      throw new StoreError(`Failed to append row: ${errorMessage(err)}`, { url });
    }
  }
}
