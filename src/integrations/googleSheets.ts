/**
* googleSheets.ts
*
* Thin wrapper around the Google Sheets API (v4) used by the queue writer:
*   - `formatQueueRow()` → turns a validated prompt into the flat array of
*     cell values matching the queue worksheet's column layout.
*   - `appendRow()` → a single append call (no retries – the caller owns the
*     retry policy).
*
* Authentication uses a service-account key file whose path is passed in
* explicitly (normally from `GOOGLE_APPLICATION_CREDENTIALS`).
*/

import { google, sheets_v4 } from 'googleapis';

// ---------------------------------------------------------------------------
// Constants & types
// ---------------------------------------------------------------------------

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export type QueueStatus = 'PENDING';

export interface QueueRowOptions {
  /** Add `[timestamp, status]` after the prompt column. */
  includeMetadata: boolean;
  /** Defaults to the current time. */
  createdAt?: Date;
  status?: QueueStatus;
}

export interface WriteResult {
  /** A1 range the API reports as written, e.g. `Process!A42:C42`. */
  updatedRange?: string;
  /** Absent when the API response carried no update summary. */
  updatedRows?: number;
  values: string[];
}

// ---------------------------------------------------------------------------
// Client handling
// ---------------------------------------------------------------------------

let cachedClient: sheets_v4.Sheets | null = null;
let cachedKeyFile: string | null = null;

export function getSheetsClient(credentialsFile: string): sheets_v4.Sheets {
  if (cachedClient && cachedKeyFile === credentialsFile) return cachedClient;

  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsFile,
    scopes: SHEETS_SCOPES,
  });

  cachedClient = google.sheets({ version: 'v4', auth });
  cachedKeyFile = credentialsFile;
  return cachedClient;
}

/** Drop the cached client (process teardown, tests). */
export function resetSheetsClient(): void {
  cachedClient = null;
  cachedKeyFile = null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
* A1 reference to the first cell of `worksheet`, quoted so tab names with
* spaces or apostrophes survive. The append call finds the next free row.
*/
export function worksheetRange(worksheet: string): string {
  return `'${worksheet.replace(/'/g, "''")}'!A1`;
}

/**
* Convert a prompt into `[Prompt]` or `[Prompt, Created At, Status]`.
*/
export function formatQueueRow(prompt: string, opts: QueueRowOptions): string[] {
  if (!opts.includeMetadata) return [prompt];

  return [prompt, (opts.createdAt ?? new Date()).toISOString(), opts.status ?? 'PENDING'];
}

/**
* Append one row below the last populated row of `worksheet`.
*
* `RAW` input keeps a prompt that starts with `=` or `+` from being parsed as
* a formula.
*/
export async function appendRow(
  row: string[],
  opts: {
    spreadsheetId: string;
    worksheet: string;
    sheetsClient: sheets_v4.Sheets;
  },
): Promise<WriteResult> {
  const res = await opts.sheetsClient.spreadsheets.values.append({
    spreadsheetId: opts.spreadsheetId,
    range: worksheetRange(opts.worksheet),
    valueInputOption: 'RAW',
    insertDataOption: 'INSERT_ROWS',
    requestBody: { values: [row] },
  });

  const updates = res.data.updates;
  return {
    updatedRange: updates?.updatedRange ?? undefined,
    updatedRows: updates?.updatedRows ?? undefined,
    values: row,
  };
}

export default {
  formatQueueRow,
  appendRow,
};
