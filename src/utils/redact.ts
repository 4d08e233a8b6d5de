/**
* Credential scrubbing for anything that may reach a log line or an error
* message.
*
* Two passes: literal values the caller knows about (the configured API key),
* then well-known credential shapes so that keys we were never told about are
* caught as well.
*/

export const REDACTED = '[REDACTED]';

/** Literal secrets shorter than this are ignored – they would shred normal text. */
const MIN_SECRET_LENGTH = 4;

const CREDENTIAL_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  // PEM private keys (service-account JSON embeds one).
  [/-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, REDACTED],
  // Google API keys.
  [/AIza[0-9A-Za-z_-]{35}/g, REDACTED],
  // OpenAI style secret keys.
  [/\bsk-[A-Za-z0-9_-]{16,}/g, REDACTED],
  [/(Bearer\s+)[A-Za-z0-9._~+/-]+=*/gi, `$1${REDACTED}`],
  [/([?&](?:key|api_key|access_token)=)[^&\s"']+/gi, `$1${REDACTED}`],
  [/("private_key"\s*:\s*")[^"]*(")/g, `$1${REDACTED}$2`],
];

export function redactSecrets(text: string, secrets: readonly string[] = []): string {
  let out = text;

  // Longest first so a secret that contains another is removed whole.
  const literals = [...new Set(secrets)]
    .filter((s) => s.length >= MIN_SECRET_LENGTH)
    .sort((a, b) => b.length - a.length);

  for (const secret of literals) {
    out = out.split(secret).join(REDACTED);
  }

  for (const [pattern, replacement] of CREDENTIAL_PATTERNS) {
    out = out.replace(pattern, replacement);
  }

  return out;
}
