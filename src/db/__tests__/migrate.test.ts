import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates the tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual(['_migrations', 'news_items']);
  });

  it('is idempotent (second run applies nothing)', () => {
    runMigrations(db);

    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toContain('001_init.sql');
  });

  it('creates the url and publication date indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(indexes.map((i) => i.name)).toEqual(['idx_news_items_published', 'idx_news_items_url']);
  });
});
