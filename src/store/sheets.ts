import { google } from 'googleapis';
import { StoreError, errorMessage } from '../shared/errors.js';
import type { NewsStore, StoreRow } from './adapter.js';
import type { ServiceAccount } from './credentials.js';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

/**
 * The two spreadsheet calls the store needs.
 */
export interface SheetValuesClient {
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
  appendValues(spreadsheetId: string, range: string, row: StoreRow): Promise<void>;
}

export interface SheetLocation {
  spreadsheetId: string;
  sheetName: string;
  urlColumn: string;
}

/**
 * Accept either a bare spreadsheet id or a full docs.google.com URL.
 */
export function extractSpreadsheetId(value: string): string {
  const match = /\/spreadsheets\/d\/([A-Za-z0-9_-]+)/.exec(value);
  return match?.[1] ?? value.trim();
}

function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

export function createSheetValuesClient(credentials: ServiceAccount, timeoutMs: number): SheetValuesClient {
  const auth = new google.auth.JWT({
    email: credentials.client_email,
    key: credentials.private_key,
    scopes: [SHEETS_SCOPE],
  });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async getValues(spreadsheetId, range) {
      const res = await sheets.spreadsheets.values.get(
        { spreadsheetId, range, majorDimension: 'ROWS' },
        { timeout: timeoutMs },
      );
      const values: unknown[][] = res.data.values ?? [];
      return values;
    },
    async appendValues(spreadsheetId, range, row) {
      await sheets.spreadsheets.values.append(
        {
          spreadsheetId,
          range,
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: [row] },
        },
        { timeout: timeoutMs },
      );
    },
  };
}

export class GoogleSheetsStore implements NewsStore {
  readonly kind = 'sheets';
  private readonly spreadsheetId: string;
  private readonly urlRange: string;
  private readonly rowRange: string;

  constructor(
    private readonly client: SheetValuesClient,
    location: SheetLocation,
  ) {
    this.spreadsheetId = extractSpreadsheetId(location.spreadsheetId);
    const sheet = quoteSheetName(location.sheetName);
    this.urlRange = `${sheet}!${location.urlColumn}:${location.urlColumn}`;
    this.rowRange = `${sheet}!A:E`;
  }

  async listUrls(): Promise<string[]> {
    let rows: unknown[][];
    try {
      rows = await this.client.getValues(this.spreadsheetId, this.urlRange);
    } catch (err) {
      throw new StoreError(`Failed to read ${this.urlRange}: ${errorMessage(err)}`, {
        spreadsheet_id: this.spreadsheetId,
      });
    }

    const urls: string[] = [];
    rows.forEach((row, index) => {
      const cell = row[0];
      if (cell === undefined || cell === null) return;
      const value = String(cell).trim();
      if (!value) return;
      if (index === 0 && value.toLowerCase() === 'url') return;
      urls.push(value);
    });
    return urls;
  }

  async appendRow(row: StoreRow): Promise<void> {
    try {
      await this.client.appendValues(this.spreadsheetId, this.rowRange, row);
    } catch (err) {
      throw new StoreError(`Failed to append row: ${errorMessage(err)}`, {
        spreadsheet_id: this.spreadsheetId,
        url: row[3],
      });
    }
  }
}
