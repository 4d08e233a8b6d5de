/**
* logger.ts
* Structured JSON logger compatible with Google Cloud Logging.
*
* Each line is a canonical object:
*   – `timestamp` → ISO-8601 string in UTC.
*   – `severity`  → DEBUG | INFO | WARNING | ERROR.
*   – `message`   → human-readable message string.
*   – `metadata`  → optional JSON payload.
*
* Every string that ends up in a line (message and metadata alike) is passed
* through `redactSecrets()` with the values registered via `registerSecrets()`,
* so a key that slips into a log call is still never written.
*/

import { redactSecrets } from './redact';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export const LOG_SEVERITIES: readonly LogSeverity[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string; // e.g. 2026-10-19T07:00:12.123Z
  severity: LogSeverity;
  message: string;
  metadata?: LogMetadata;
}

// ---------------------------------------------------------------------------
// Process-wide settings
// ---------------------------------------------------------------------------

let minSeverity: LogSeverity = 'DEBUG';
let secrets: string[] = [];

export function setLogLevel(level: LogSeverity): void {
  minSeverity = level;
}

/** Values that must never appear in a log line (API keys, tokens, ...). */
export function registerSecrets(values: readonly string[]): void {
  secrets = [...secrets, ...values.filter((v) => v.length > 0)];
}

/** Teardown counterpart of `registerSecrets()` / `setLogLevel()`. */
export function resetLogger(): void {
  secrets = [];
  minSeverity = 'DEBUG';
}

export function isLogSeverity(value: string): value is LogSeverity {
  return LOG_SEVERITIES.some((s) => s === value);
}

// ---------------------------------------------------------------------------
// Value normalisation
// ---------------------------------------------------------------------------

/**
* Recursively walk a value converting `Error` instances into plain objects
* with `name`, `message` and `stack` so they survive `JSON.stringify()`, and
* scrubbing registered secrets out of every string on the way.
*/
function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactSecrets(value, secrets);
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactSecrets(value.message, secrets),
      stack: value.stack === undefined ? undefined : redactSecrets(value.stack, secrets),
    };
  }

  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = normalizeValue(v);
    }
    return result;
  }

  return value;
}

function normalizeMetadata(metadata: LogMetadata): LogMetadata {
  const result: LogMetadata = {};
  for (const [k, v] of Object.entries(metadata)) {
    result[k] = normalizeValue(v);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Internal helper – single implementation funneled through by the public API
// ---------------------------------------------------------------------------

function emit(severity: LogSeverity, message: string, metadata?: LogMetadata): void {
  if (LOG_SEVERITIES.indexOf(severity) < LOG_SEVERITIES.indexOf(minSeverity)) return;

  const normalizedMetadata = metadata ? normalizeMetadata(metadata) : undefined;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    severity,
    message: redactSecrets(message, secrets),
    ...(normalizedMetadata && Object.keys(normalizedMetadata).length ? { metadata: normalizedMetadata } : {}),
  };

  const serialized = JSON.stringify(entry);

  /* eslint-disable no-console */
  switch (severity) {
    case 'DEBUG':
    case 'INFO':
      console.log(serialized);
      break;
    case 'WARNING':
      console.warn(serialized);
      break;
    case 'ERROR':
      console.error(serialized);
      break;
  }
  /* eslint-enable no-console */
}

// ---------------------------------------------------------------------------
// Public API – severity-specific wrappers
// ---------------------------------------------------------------------------

export const debug = (msg: string, meta?: LogMetadata): void => emit('DEBUG', msg, meta);
export const info = (msg: string, meta?: LogMetadata): void => emit('INFO', msg, meta);
export const warn = (msg: string, meta?: LogMetadata): void => emit('WARNING', msg, meta);
export const error = (msg: string, meta?: LogMetadata): void => emit('ERROR', msg, meta);

export default { debug, info, warn, error } as const;
