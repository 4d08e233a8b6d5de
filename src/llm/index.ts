/**
* Generic LLM provider wrapper.
*
* Two providers are wired:
*   – `gemini` → Generative Language REST API (`models/{model}:generateContent`).
*   – `openai` → chat-completions, or any endpoint speaking the same protocol.
*
* `generateText()` is a pure I/O wrapper: it returns whatever text the model
* produced, possibly an empty string. Deciding whether that text is usable is
* the caller's business.
*/

import axios from 'axios';

import { API_KEY_VARS, getOptionalConfig, LlmProvider } from '../config';

export type SupportedProvider = LlmProvider;

export interface GenerateTextOptions {
  /**
   * Which provider to route the call to. Defaults to `gemini`.
   */
  provider?: SupportedProvider;
  /**
   * Model ID / name understood by the provider. Falls back to a
   * provider-specific default.
   */
  modelId?: string;
  /** System instruction sent alongside the user turn. */
  systemInstruction?: string;
  /**
   * Sampling temperature. Typical values 0-2. Defaults to `1.0`.
   */
  temperature?: number;
  /**
   * Maximum tokens for the generated completion. Gemini leaves it unset by
   * default (thinking models spend output tokens before the answer).
   */
  maxTokens?: number;
  /**
   * Override the HTTPS endpoint (proxy, Azure/OpenAI, regional Gemini host).
   */
  endpoint?: string;
  /**
   * API key. When omitted it is read from `GOOGLE_API_KEY` / `OPENAI_API_KEY`.
   */
  apiKey?: string;
  /** HTTP timeout in milliseconds. Defaults to 60 s. */
  timeoutMs?: number;
}

/** Default model IDs per provider */
export const DEFAULT_MODELS: Record<SupportedProvider, string> = {
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
};

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
const OPENAI_ENDPOINT = 'https://api.openai.com/v1/chat/completions';

const DEFAULT_TEMPERATURE = 1.0;
const DEFAULT_TIMEOUT_MS = 60_000;

/** Gemini finish reasons that mean the answer was withheld. */
const BLOCKING_FINISH_REASONS = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'RECITATION']);

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Non-2xx answer from a provider endpoint. */
export class LlmHttpError extends Error {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`HTTP ${status} – ${body}`);
    this.name = 'LlmHttpError';
  }
}

/** The provider refused to answer (safety filters, recitation, ...). */
export class LlmBlockedError extends Error {
  constructor(readonly reason: string) {
    super(`Response blocked by provider: ${reason}`);
    this.name = 'LlmBlockedError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function generateText(prompt: string, opts: GenerateTextOptions = {}): Promise<string> {
  const provider = opts.provider ?? 'gemini';

  switch (provider) {
    case 'gemini':
      return geminiGenerateText(prompt, opts);

    case 'openai':
      return openaiGenerateText(prompt, opts);

    default: {
      // Exhaustive guard so TypeScript will flag on new providers.
      const _never: never = provider;
      throw new Error(`Unsupported provider: ${String(_never)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Provider helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
  if (!Array.isArray(value)) return undefined;
  const [first] = value;
  return isRecord(first) ? first : undefined;
}

/** JSON HTTP POST through axios (nock intercepts it in tests). */
async function httpPostJson(
  url: string,
  headers: Record<string, string>,
  body: Record<string, unknown>,
  timeoutMs: number,
): Promise<unknown> {
  const res = await axios.post<unknown>(url, body, {
    headers: {
      ...headers,
      'Content-Type': 'application/json',
    },
    timeout: timeoutMs,
    validateStatus: () => true, // we throw manually for non-2xx
  });

  if (res.status >= 400) {
    throw new LlmHttpError(res.status, JSON.stringify(res.data));
  }

  return res.data;
}

function resolveApiKey(provider: SupportedProvider, opts: GenerateTextOptions): string {
  const apiKey = opts.apiKey || getOptionalConfig(API_KEY_VARS[provider]);
  if (!apiKey) {
    throw new Error(`Missing ${API_KEY_VARS[provider]} – set it in the environment or pass it explicitly.`);
  }
  return apiKey;
}

// ------------------------------ Gemini --------------------------------------

async function geminiGenerateText(prompt: string, opts: GenerateTextOptions): Promise<string> {
  const apiKey = resolveApiKey('gemini', opts);
  const modelId = opts.modelId || DEFAULT_MODELS.gemini;
  const endpoint =
    opts.endpoint?.replace(/\/$/, '') || `${GEMINI_BASE_URL}/models/${encodeURIComponent(modelId)}:generateContent`;

  const generationConfig: Record<string, number> = {
    temperature: typeof opts.temperature === 'number' ? opts.temperature : DEFAULT_TEMPERATURE,
  };
  if (typeof opts.maxTokens === 'number') {
    generationConfig.maxOutputTokens = Math.max(opts.maxTokens, 1);
  }

  const body: Record<string, unknown> = {
    contents: [{ role: 'user', parts: [{ text: prompt }] }],
    generationConfig,
    ...(opts.systemInstruction ? { systemInstruction: { parts: [{ text: opts.systemInstruction }] } } : {}),
  };

  const json = await httpPostJson(endpoint, { 'x-goog-api-key': apiKey }, body, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  return extractGeminiText(json);
}

/**
* Concatenate the text parts of the first candidate. Throws `LlmBlockedError`
* when the prompt or the answer was withheld; returns `''` when the model
* simply produced nothing.
*/
export function extractGeminiText(json: unknown): string {
  if (!isRecord(json)) return '';

  const feedback = json.promptFeedback;
  if (isRecord(feedback) && typeof feedback.blockReason === 'string') {
    throw new LlmBlockedError(feedback.blockReason);
  }

  const candidate = firstRecord(json.candidates);
  if (!candidate) return '';

  const content = candidate.content;
  const parts = isRecord(content) && Array.isArray(content.parts) ? content.parts : [];
  const text = parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('');

  const finishReason = candidate.finishReason;
  if (!text && typeof finishReason === 'string' && BLOCKING_FINISH_REASONS.has(finishReason)) {
    throw new LlmBlockedError(finishReason);
  }

  return text;
}

// ------------------------------ OpenAI --------------------------------------

async function openaiGenerateText(prompt: string, opts: GenerateTextOptions): Promise<string> {
  const apiKey = resolveApiKey('openai', opts);
  const endpoint = opts.endpoint?.replace(/\/$/, '') || OPENAI_ENDPOINT;
  const modelId = opts.modelId || DEFAULT_MODELS.openai;

  const messages = [
    ...(opts.systemInstruction ? [{ role: 'system', content: opts.systemInstruction }] : []),
    { role: 'user', content: prompt },
  ];

  const body = {
    model: modelId,
    messages,
    temperature: typeof opts.temperature === 'number' ? opts.temperature : DEFAULT_TEMPERATURE,
    max_tokens: Math.max(typeof opts.maxTokens === 'number' ? opts.maxTokens : 1024, 1),
  };

  const json = await httpPostJson(
    endpoint,
    { Authorization: `Bearer ${apiKey}` },
    body,
    opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  );

  return extractOpenAiText(json);
}

export function extractOpenAiText(json: unknown): string {
  if (!isRecord(json)) return '';

  const choice = firstRecord(json.choices);
  const message = choice?.message;
  if (!isRecord(message)) return '';

  if (typeof message.refusal === 'string' && message.refusal) {
    throw new LlmBlockedError('refusal');
  }

  return typeof message.content === 'string' ? message.content : '';
}
