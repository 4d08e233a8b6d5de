/**
* Centralised configuration loader.
*
* Usage examples:
*
* ```ts
* import { getConfig, loadConfig } from '../config';
*
* // Throws when the key is missing
* const spreadsheetId = getConfig('SHEETS_SPREADSHEET_ID');
*
* // Optional key with fallback + custom validation
* const endpoint = getConfig('LLM_ENDPOINT', {
*   required: false,
*   validate: (url) =>
*     /^https?:\/\//.test(url) || 'LLM_ENDPOINT must be an absolute URL',
* });
*
* // Everything the job needs, resolved once at start-up
* const config = loadConfig(process.env);
* ```
*
* Error messages name the offending key but never echo its value, since most
* of what lives here is credential material.
*/

import { isLogSeverity, LogSeverity } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../utils/retry';

// ---------------------------------------------------------------------------
// Primitive lookups
// ---------------------------------------------------------------------------

export type ConfigSource = Record<string, string | undefined>;

export interface GetConfigOptions {
  /**
   * Throw when the key is missing or an empty string. Defaults to `true`.
   */
  required?: boolean;

  /**
   * Fallback value when the key is undefined/empty.
   */
  fallback?: string;

  /**
   * Optional validator. Return `true` for valid inputs or a **string** with a
   * custom error message when invalid.
   */
  validate?: (value: string) => boolean | string;

  /** Where to read from. Defaults to `process.env`. */
  source?: ConfigSource;
}

export function getConfig(key: string, opts: GetConfigOptions & { required?: true }): string;
export function getConfig(key: string, opts?: GetConfigOptions): string | undefined;
export function getConfig(key: string, opts: GetConfigOptions = {}): string | undefined {
  const { required = true, fallback, validate, source = process.env } = opts;

  let val = source[key]?.trim();

  if ((val === undefined || val === '') && typeof fallback === 'string') {
    val = fallback;
  }

  if ((val === undefined || val === '') && required) {
    throw new Error(`Missing required configuration key "${key}" – set it in the environment or a .env file.`);
  }

  if (val === '') val = undefined;

  // Validation – only for values that are actually present.
  if (val !== undefined && validate) {
    const result = validate(val);
    if (result !== true) {
      throw new Error(typeof result === 'string' ? result : `Invalid value for config key "${key}"`);
    }
  }

  return val;
}

/** Shortcut for `getConfig(key, { required: false })`. */
export function getOptionalConfig(key: string, fallback?: string, source?: ConfigSource): string | undefined {
  return getConfig(key, { required: false, fallback, source });
}

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

const isAbsoluteUrl = (key: string) => (value: string): true | string =>
  /^https?:\/\//.test(value) || `${key} must be an absolute http(s) URL`;

const isIntegerInRange = (key: string, min: number, max: number) => (value: string): true | string => {
  const n = Number(value);
  return (Number.isInteger(n) && n >= min && n <= max) || `${key} must be an integer between ${min} and ${max}`;
};

const isNumberInRange = (key: string, min: number, max: number) => (value: string): true | string => {
  const n = Number(value);
  return (Number.isFinite(n) && n >= min && n <= max) || `${key} must be a number between ${min} and ${max}`;
};

const isBooleanFlag = (key: string) => (value: string): true | string =>
  /^(true|false|1|0|yes|no)$/i.test(value) || `${key} must be true or false`;

function parseBooleanFlag(value: string): boolean {
  return /^(true|1|yes)$/i.test(value);
}

// ---------------------------------------------------------------------------
// Application config
// ---------------------------------------------------------------------------

export type LlmProvider = 'gemini' | 'openai';

export const LLM_PROVIDERS: readonly LlmProvider[] = ['gemini', 'openai'];

function isLlmProvider(value: string): value is LlmProvider {
  return LLM_PROVIDERS.some((p) => p === value);
}

/** Environment variable holding the API key for each provider. */
export const API_KEY_VARS: Record<LlmProvider, string> = {
  gemini: 'GOOGLE_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  /** Undefined → provider default. */
  modelId?: string;
  endpoint?: string;
  temperature: number;
  timeoutMs: number;
}

export interface SheetsConfig {
  spreadsheetId: string;
  worksheet: string;
  /** Path to the service-account key file. */
  credentialsFile: string;
  /** Append `[timestamp, status]` after the prompt column. */
  includeMetadata: boolean;
}

export interface AppConfig {
  llm: LlmConfig;
  sheets: SheetsConfig;
  retry: RetryPolicy;
  logLevel: LogSeverity;
}

/**
* Resolve and validate every setting the job needs. Called once at start-up;
* the result is handed to the components explicitly.
*/
export function loadConfig(source: ConfigSource = process.env): AppConfig {
  const providerRaw = getConfig('LLM_PROVIDER', { fallback: 'gemini', source }).toLowerCase();
  if (!isLlmProvider(providerRaw)) {
    throw new Error(`LLM_PROVIDER must be one of: ${LLM_PROVIDERS.join(', ')}`);
  }
  const provider = providerRaw;

  const llm: LlmConfig = {
    provider,
    apiKey: getConfig(API_KEY_VARS[provider], { source }),
    modelId: getConfig('LLM_MODEL_ID', { required: false, source }),
    endpoint: getConfig('LLM_ENDPOINT', { required: false, validate: isAbsoluteUrl('LLM_ENDPOINT'), source }),
    temperature: Number(
      getConfig('LLM_TEMPERATURE', { fallback: '1.0', validate: isNumberInRange('LLM_TEMPERATURE', 0, 2), source }),
    ),
    timeoutMs: Number(
      getConfig('LLM_TIMEOUT_MS', {
        fallback: '60000',
        validate: isIntegerInRange('LLM_TIMEOUT_MS', 1, 600_000),
        source,
      }),
    ),
  };

  const sheets: SheetsConfig = {
    spreadsheetId: getConfig('SHEETS_SPREADSHEET_ID', { source }),
    worksheet: getConfig('SHEETS_WORKSHEET', { fallback: 'Process', source }),
    credentialsFile: getConfig('GOOGLE_APPLICATION_CREDENTIALS', { source }),
    includeMetadata: parseBooleanFlag(
      getConfig('QUEUE_ROW_METADATA', { fallback: 'false', validate: isBooleanFlag('QUEUE_ROW_METADATA'), source }),
    ),
  };

  const retry: RetryPolicy = {
    attempts: Number(
      getConfig('RETRY_ATTEMPTS', {
        fallback: String(DEFAULT_RETRY_POLICY.attempts),
        validate: isIntegerInRange('RETRY_ATTEMPTS', 1, 10),
        source,
      }),
    ),
    delayMs: Number(
      getConfig('RETRY_DELAY_MS', {
        fallback: String(DEFAULT_RETRY_POLICY.delayMs),
        validate: isIntegerInRange('RETRY_DELAY_MS', 0, 600_000),
        source,
      }),
    ),
  };

  const logLevelRaw = getConfig('LOG_LEVEL', { fallback: 'INFO', source }).toUpperCase();
  if (!isLogSeverity(logLevelRaw)) {
    throw new Error('LOG_LEVEL must be one of: DEBUG, INFO, WARNING, ERROR');
  }

  return { llm, sheets, retry, logLevel: logLevelRaw };
}

/** Credential values that must be scrubbed from logs and error messages. */
export function secretsOf(config: AppConfig): string[] {
  return [config.llm.apiKey];
}

export default {
  getConfig,
  getOptionalConfig,
  loadConfig,
};
