/**
* Error taxonomy for the prompt pipeline plus the classifier that decides
* whether a raw failure (HTTP status, socket error, provider refusal) is worth
* another attempt.
*
* Domain errors are built from a fixed, per-category message. The raw error
* is *not* kept as `cause`: client libraries happily embed request headers
* and URLs (including `?key=`) in their messages and config objects.
*/

import { LlmBlockedError } from '../llm';
import { redactSecrets } from '../utils/redact';

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type FailureCategory =
  | 'quota'
  | 'auth'
  | 'credentials'
  | 'not_found'
  | 'invalid_request'
  | 'timeout'
  | 'server'
  | 'network'
  | 'safety'
  | 'unknown';

const TRANSIENT_CATEGORIES: ReadonlySet<FailureCategory> = new Set(['quota', 'timeout', 'server', 'network']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);
const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'ENETDOWN',
  'ENETRESET',
  'EHOSTUNREACH',
  'EPROTO',
  'UND_ERR_SOCKET',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
]);
const CREDENTIAL_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR']);

/**
* Extract an HTTP status from the error shapes we meet in practice: our own
* `LlmHttpError` (`status`), axios / gaxios (`response.status`), and gaxios'
* numeric `code`.
*/
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;

  if ('status' in err && typeof err.status === 'number') return err.status;

  if (
    'response' in err &&
    typeof err.response === 'object' &&
    err.response !== null &&
    'status' in err.response &&
    typeof err.response.status === 'number'
  ) {
    return err.response.status;
  }

  if ('code' in err && typeof err.code === 'number') return err.code;

  return undefined;
}

/** Node / axios string error code such as `ECONNRESET`. */
export function errorCodeOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

export function classifyFailure(err: unknown): FailureCategory {
  if (err instanceof LlmBlockedError) return 'safety';

  const status = httpStatusOf(err);
  const message = messageOf(err).toLowerCase();

  if (status !== undefined) {
    if (status === 429) return 'quota';
    if (status === 401 || status === 403) return 'auth';
    if (status === 404) return 'not_found';
    if (status === 408 || status === 504) return 'timeout';
    if (status >= 500) return 'server';
    if (status === 400) {
      // Sheets answers a missing worksheet with 400 "Unable to parse range".
      if (message.includes('unable to parse range')) return 'not_found';
      if (message.includes('api key not valid') || message.includes('api_key_invalid')) return 'auth';
      return 'invalid_request';
    }
  }

  const code = errorCodeOf(err);
  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) return 'timeout';
    if (NETWORK_CODES.has(code)) return 'network';
    if (CREDENTIAL_CODES.has(code)) return 'credentials';
  }

  if (message.includes('quota') || message.includes('rate limit')) return 'quota';
  if (message.includes('permission') || message.includes('api_key') || message.includes('unauthenticated')) {
    return 'auth';
  }
  if (message.includes('timeout') || message.includes('timed out') || message.includes('deadline')) {
    return 'timeout';
  }
  if (
    message.includes('socket hang up') ||
    message.includes('network') ||
    message.includes('transport') ||
    /\b(ssl|tls)\b/.test(message)
  ) {
    return 'network';
  }

  return 'unknown';
}

export function isTransient(category: FailureCategory): boolean {
  return TRANSIENT_CATEGORIES.has(category);
}

export function isTransientFailure(err: unknown): boolean {
  return isTransient(classifyFailure(err));
}

// ---------------------------------------------------------------------------
// Domain errors
// ---------------------------------------------------------------------------

export type PipelineStage = 'generation' | 'validation' | 'storage';

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(
    message: string,
    readonly category: FailureCategory | 'empty_output',
    readonly attempts: number,
  ) {
    super(message);
  }
}

export class GenerationError extends PipelineError {
  readonly stage = 'generation';

  constructor(message: string, category: FailureCategory, attempts: number) {
    super(message, category, attempts);
    this.name = 'GenerationError';
  }
}

export class EmptyOutputError extends PipelineError {
  readonly stage = 'validation';

  constructor(message = 'Generated prompt is empty') {
    super(message, 'empty_output', 0);
    this.name = 'EmptyOutputError';
  }
}

export class StorageError extends PipelineError {
  readonly stage = 'storage';

  constructor(message: string, category: FailureCategory, attempts: number) {
    super(message, category, attempts);
    this.name = 'StorageError';
  }
}

// ---------------------------------------------------------------------------
// Factories – raw failure → sanitised domain error
// ---------------------------------------------------------------------------

const GENERATION_MESSAGES: Record<FailureCategory, string> = {
  quota: 'Generative-language API quota exceeded',
  auth: 'Generative-language API key is invalid or restricted',
  credentials: 'Generative-language API credentials could not be loaded',
  not_found: 'Requested model was not found',
  invalid_request: 'Generative-language API rejected the request',
  timeout: 'Request to the generative-language API timed out',
  server: 'Generative-language API is unavailable',
  network: 'Network connection to the generative-language API failed',
  safety: 'Response was blocked by safety filters',
  unknown: 'Prompt generation failed due to a system issue',
};

const STORAGE_MESSAGES: Record<FailureCategory, string> = {
  quota: 'Google Sheets API quota exceeded',
  auth: 'Google Sheets permission denied or invalid credentials',
  credentials: 'Service-account credentials could not be loaded',
  not_found: 'Target worksheet or spreadsheet not found',
  invalid_request: 'Google Sheets API rejected the append request',
  timeout: 'Request to the Google Sheets API timed out',
  server: 'Google Sheets API is unavailable',
  network: 'Network connection to the Google Sheets API failed',
  safety: 'Google Sheets API rejected the content',
  unknown: 'Spreadsheet update failed due to a system issue',
};

export interface ErrorContext {
  attempts: number;
  /** Literal secret values to scrub from any detail text. */
  secrets?: readonly string[];
}

function describeFailure(
  table: Record<FailureCategory, string>,
  category: FailureCategory,
  err: unknown,
  ctx: ErrorContext,
): string {
  const base = table[category];
  const suffix = ` (after ${ctx.attempts} attempt${ctx.attempts === 1 ? '' : 's'})`;
  if (category !== 'unknown') return base + suffix;

  const detail = redactSecrets(messageOf(err), ctx.secrets);
  return `${base}${suffix}: ${detail}`;
}

export function toGenerationError(err: unknown, ctx: ErrorContext): GenerationError {
  if (err instanceof GenerationError) return err;
  const category = classifyFailure(err);
  return new GenerationError(describeFailure(GENERATION_MESSAGES, category, err, ctx), category, ctx.attempts);
}

export function toStorageError(err: unknown, ctx: ErrorContext): StorageError {
  if (err instanceof StorageError) return err;
  const category = classifyFailure(err);
  return new StorageError(describeFailure(STORAGE_MESSAGES, category, err, ctx), category, ctx.attempts);
}
