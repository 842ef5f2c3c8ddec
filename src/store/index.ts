import type { Config } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import type { NewsStore } from './adapter.js';
import { decodeServiceAccount } from './credentials.js';
import { GoogleSheetsStore, createSheetValuesClient } from './sheets.js';
import { SqliteStore } from './sqlite.js';

export interface StoreHandle {
  store: NewsStore;
  close(): void;
}

/**
 * Open the configured store for one run. The service-account credential is
 * decoded here and dropped with the handle.
 */
export function openStore(config: Config['store']): StoreHandle {
  if (config.backend === 'sqlite') {
    const db = initDb(config.sqlite.path);
    runMigrations(db);
    return { store: new SqliteStore(db), close: closeDb };
  }

  if (!config.sheets.spreadsheet_id) {
    throw new ConfigError('store.sheets.spreadsheet_id is not set (AI_NEWS_DIGEST_SHEET_ID)');
  }
  const credentials = decodeServiceAccount(config.sheets.credentials_base64);
  const client = createSheetValuesClient(credentials, config.timeout_ms);
  return {
    store: new GoogleSheetsStore(client, {
      spreadsheetId: config.sheets.spreadsheet_id,
      sheetName: config.sheets.sheet_name,
      urlColumn: config.sheets.url_column,
    }),
    close: () => undefined,
  };
}

