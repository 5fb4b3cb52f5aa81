import { ZodError } from 'zod';
import { DEFAULT_SYSTEM_PROMPT, loadConfig, parseArgs } from '../src/config.js';

const argv = ['node', 'index.js'];

describe('Configuration', () => {
  test('should parse flags with and without values', () => {
    expect(parseArgs(['node', 'index.js', '--port', '7000', '--debug', '--model', 'mistral-small-latest'])).toEqual({
      port: '7000',
      debug: true,
      model: 'mistral-small-latest',
    });
  });

  test('should fall back to defaults', () => {
    const config = loadConfig(argv, {});

    expect(config.server).toEqual({
      name: 'risk-copilot',
      version: '1.1.0',
      port: 8000,
      corsOrigins: ['*'],
      debug: false,
    });
    expect(config.mistral).toEqual({
      apiUrl: 'https://api.mistral.ai',
      apiKey: undefined,
      model: 'mistral-large-latest',
      temperature: 0.2,
      maxTokens: 650,
      requestTimeoutMs: 30000,
    });
    expect(config.prompt).toEqual({ systemPrompt: DEFAULT_SYSTEM_PROMPT, contextBudgetChars: 12000 });
    expect(config.retry).toEqual({ maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 4000 });
    expect(config.sessions).toEqual({ lockTtlMinutes: 30 });
  });

  test('should read environment variables', () => {
    const config = loadConfig(argv, {
      MISTRAL_API_KEY: 'test-key',
      MISTRAL_API_URL: 'https://api.test/',
      MISTRAL_MODEL: 'mistral-small-latest',
      PORT: '9000',
      CORS_ORIGINS: 'http://localhost:8501, http://localhost:3000',
      CONTEXT_BUDGET_CHARS: '4000',
    });

    expect(config.mistral.apiKey).toBe('test-key');
    expect(config.mistral.apiUrl).toBe('https://api.test');
    expect(config.mistral.model).toBe('mistral-small-latest');
    expect(config.server.port).toBe(9000);
    expect(config.server.corsOrigins).toEqual(['http://localhost:8501', 'http://localhost:3000']);
    expect(config.prompt.contextBudgetChars).toBe(4000);
  });

  test('should let CLI arguments win over the environment', () => {
    const config = loadConfig([...argv, '--port', '7000', '--debug'], { PORT: '9000', DEBUG: 'false' });

    expect(config.server.port).toBe(7000);
    expect(config.server.debug).toBe(true);
  });

  test('should treat an empty API key as missing', () => {
    expect(loadConfig(argv, { MISTRAL_API_KEY: '' }).mistral.apiKey).toBeUndefined();
  });

  test.each([
    ['RETRY_MAX_ATTEMPTS', '0'],
    ['PORT', 'not-a-number'],
    ['MISTRAL_API_URL', 'not a url'],
    ['MODEL_TEMPERATURE', '3'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => loadConfig(argv, { [key]: value })).toThrow(ZodError);
  });
});
