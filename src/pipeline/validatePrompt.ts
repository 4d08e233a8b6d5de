/**
* validatePrompt.ts
*
* The gate between generation and storage: nothing reaches the spreadsheet
* unless it went through `validatePrompt()`. The `ValidatedPrompt` brand makes
* that a compile-time rule for `QueueWriter.append()`.
*/

import { EmptyOutputError } from '../errors';

declare const validatedBrand: unique symbol;

/** Trimmed, non-empty prompt text that fits in a single Sheets cell. */
export type ValidatedPrompt = string & { readonly [validatedBrand]: true };

/**
* Maximum character length of a single Google Sheets cell (documented limit
* is 50 000). Longer text is clipped and ends with an ellipsis.
*/
export const MAX_SHEETS_CELL_LEN = 50_000;

function isValidatedPrompt(text: string): text is ValidatedPrompt {
  return text.length > 0 && text.length <= MAX_SHEETS_CELL_LEN && text === text.trim();
}

/** `text.slice(0, end)` without leaving half of a surrogate pair behind. */
function clipAtCodePoint(text: string, end: number): string {
  const last = text.charCodeAt(end - 1);
  const cut = last >= 0xd800 && last <= 0xdbff ? end - 1 : end;
  return text.slice(0, cut);
}

/**
* @throws {EmptyOutputError} When `text` is absent, empty or whitespace-only.
*/
export function validatePrompt(text: string | null | undefined): ValidatedPrompt {
  let cleaned = (text ?? '').trim();

  if (cleaned.length > MAX_SHEETS_CELL_LEN) {
    cleaned = clipAtCodePoint(cleaned, MAX_SHEETS_CELL_LEN - 1).trimEnd() + '…';
  }

  if (!isValidatedPrompt(cleaned)) {
    throw new EmptyOutputError();
  }

  return cleaned;
}
