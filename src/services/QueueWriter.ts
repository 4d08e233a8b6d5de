/**
* QueueWriter.ts
*
* Appends validated prompts to the queue worksheet. One `append()` call writes
* exactly one row or nothing at all: the Sheets append is atomic per request,
* and a failed attempt never leaves a partial row behind to clean up.
*/

import { sheets_v4 } from 'googleapis';

import { SheetsConfig } from '../config';
import { classifyFailure, isTransientFailure, StorageError, toStorageError } from '../errors';
import { appendRow, formatQueueRow, getSheetsClient, WriteResult } from '../integrations/googleSheets';
import { ValidatedPrompt } from '../pipeline/validatePrompt';
import * as logger from '../utils/logger';
import { RetryError, RetryPolicy, withRetry } from '../utils/retry';

export interface QueueWriterDeps {
  /** Pre-configured client; defaults to one built from `credentialsFile`. */
  sheetsClient?: sheets_v4.Sheets;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  /** Literal secrets to scrub from error details. */
  secrets?: readonly string[];
}

export class QueueWriter {
  constructor(
    private readonly sheets: SheetsConfig,
    private readonly retry: RetryPolicy,
    private readonly deps: QueueWriterDeps = {},
  ) {}

  /**
  * @throws {StorageError} On a non-retryable failure (permissions, missing
  * worksheet, unreadable credentials) or once the retry budget is spent.
  */
  async append(prompt: ValidatedPrompt): Promise<WriteResult> {
    const row = formatQueueRow(prompt, {
      includeMetadata: this.sheets.includeMetadata,
      createdAt: this.deps.now?.(),
    });

    try {
      const result = await withRetry(
        () =>
          appendRow(row, {
            spreadsheetId: this.sheets.spreadsheetId,
            worksheet: this.sheets.worksheet,
            sheetsClient: this.deps.sheetsClient ?? getSheetsClient(this.sheets.credentialsFile),
          }),
        {
          ...this.retry,
          isRetryable: isTransientFailure,
          sleep: this.deps.sleep,
          onRetry: ({ attempt, error, delayMs }) =>
            logger.warn('Spreadsheet append failed – retrying', {
              attempt,
              category: classifyFailure(error),
              delayMs,
            }),
        },
      );

      if (result.updatedRows === undefined) {
        logger.warn('Sheets append returned no update summary', { worksheet: this.sheets.worksheet });
      }
      logger.info('Prompt appended to queue', {
        worksheet: this.sheets.worksheet,
        updatedRange: result.updatedRange,
        preview: prompt.slice(0, 30),
      });
      return result;
    } catch (err) {
      throw this.toError(err);
    }
  }

  private toError(err: unknown): StorageError {
    const secrets = this.deps.secrets ?? [];
    if (err instanceof RetryError) {
      return toStorageError(err.lastError, { attempts: err.attempts, secrets });
    }
    return toStorageError(err, { attempts: 1, secrets });
  }
}
