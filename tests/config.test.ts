import { getConfig, getOptionalConfig, loadConfig, secretsOf } from '../src/config';

const BASE_ENV = {
  GOOGLE_API_KEY: 'test-google-key',
  SHEETS_SPREADSHEET_ID: 'sheet-123',
  GOOGLE_APPLICATION_CREDENTIALS: '/secrets/service-account.json',
};

describe('getConfig()', () => {
  it('reads from the supplied source and trims the value', () => {
    expect(getConfig('FOO', { source: { FOO: '  bar ' } })).toBe('bar');
  });

  it('throws naming the key when a required value is missing or blank', () => {
    expect(() => getConfig('FOO', { source: {} })).toThrow(/"FOO"/);
    expect(() => getConfig('FOO', { source: { FOO: '   ' } })).toThrow(/"FOO"/);
  });

  it('applies the fallback for absent values', () => {
    expect(getConfig('FOO', { fallback: 'dflt', source: {} })).toBe('dflt');
  });

  it('returns undefined for optional blanks', () => {
    expect(getOptionalConfig('FOO', undefined, { FOO: '' })).toBeUndefined();
  });

  it('surfaces a validator message', () => {
    expect(() =>
      getConfig('URL', { source: { URL: 'ftp://x' }, validate: (v) => v.startsWith('http') || 'URL must be http' }),
    ).toThrow('URL must be http');
  });

  it('uses a generic message when the validator returns false', () => {
    expect(() => getConfig('N', { source: { N: 'x' }, validate: () => false })).toThrow(
      'Invalid value for config key "N"',
    );
  });
});

describe('loadConfig()', () => {
  it('resolves defaults for a minimal Gemini environment', () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      llm: {
        provider: 'gemini',
        apiKey: 'test-google-key',
        modelId: undefined,
        endpoint: undefined,
        temperature: 1,
        timeoutMs: 60000,
      },
      sheets: {
        spreadsheetId: 'sheet-123',
        worksheet: 'Process',
        credentialsFile: '/secrets/service-account.json',
        includeMetadata: false,
      },
      retry: { attempts: 4, delayMs: 5000 },
      logLevel: 'INFO',
    });
  });

  it('honours every override', () => {
    const config = loadConfig({
      ...BASE_ENV,
      LLM_PROVIDER: 'OpenAI',
      OPENAI_API_KEY: 'test-openai-key',
      LLM_MODEL_ID: 'gpt-4o',
      LLM_ENDPOINT: 'https://proxy.example.com/v1/chat/completions',
      LLM_TEMPERATURE: '0.4',
      LLM_TIMEOUT_MS: '1500',
      SHEETS_WORKSHEET: 'Queue',
      QUEUE_ROW_METADATA: 'yes',
      RETRY_ATTEMPTS: '5',
      RETRY_DELAY_MS: '0',
      LOG_LEVEL: 'debug',
    });

    expect(config.llm).toEqual({
      provider: 'openai',
      apiKey: 'test-openai-key',
      modelId: 'gpt-4o',
      endpoint: 'https://proxy.example.com/v1/chat/completions',
      temperature: 0.4,
      timeoutMs: 1500,
    });
    expect(config.sheets.worksheet).toBe('Queue');
    expect(config.sheets.includeMetadata).toBe(true);
    expect(config.retry).toEqual({ attempts: 5, delayMs: 0 });
    expect(config.logLevel).toBe('DEBUG');
  });

  it('requires the API key of the selected provider', () => {
    expect(() => loadConfig({ ...BASE_ENV, LLM_PROVIDER: 'openai' })).toThrow(/"OPENAI_API_KEY"/);
  });

  it.each([
    ['LLM_PROVIDER', 'claude', /LLM_PROVIDER must be one of: gemini, openai/],
    ['LLM_ENDPOINT', 'not-a-url', /LLM_ENDPOINT must be an absolute/],
    ['LLM_TEMPERATURE', '3', /LLM_TEMPERATURE must be a number between 0 and 2/],
    ['RETRY_ATTEMPTS', '0', /RETRY_ATTEMPTS must be an integer between 1 and 10/],
    ['RETRY_DELAY_MS', '-1', /RETRY_DELAY_MS must be an integer/],
    ['QUEUE_ROW_METADATA', 'maybe', /QUEUE_ROW_METADATA must be true or false/],
    ['LOG_LEVEL', 'TRACE', /LOG_LEVEL must be one of/],
  ])('rejects an invalid %s', (key, value, expected) => {
    expect(() => loadConfig({ ...BASE_ENV, [key]: value })).toThrow(expected);
  });

  it('never echoes the offending value', () => {
    let message = '';
    try {
      loadConfig({ ...BASE_ENV, RETRY_ATTEMPTS: 'test-secret-ish' });
    } catch (err) {
      message = err instanceof Error ? err.message : '';
    }
    expect(message).toContain('RETRY_ATTEMPTS');
    expect(message).not.toContain('test-secret-ish');
  });

  it('lists the API key as the secret to scrub', () => {
    expect(secretsOf(loadConfig(BASE_ENV))).toEqual(['test-google-key']);
  });
});
