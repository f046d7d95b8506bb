import { join } from 'path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.databasePath).toBe(join(process.cwd(), 'data', 'analyses.db'));
    expect(config.githubToken).toBeUndefined();
    expect(config.geminiApiKey).toBeUndefined();
    expect(config.geminiModel).toBe('gemini-1.5-flash');
    expect(config.apiTokens).toEqual([]);
    expect(config.retry).toEqual({
      maxAttempts: 5,
      baseDelayMs: 1000,
      factor: 2,
      jitter: 0.2,
      maxDelayMs: 30000,
      invalidResponseMaxRetries: 2,
    });
    expect(config.limits).toEqual({ maxArtifactBytes: 200000, maxFileBytes: 50000, maxFiles: 100 });
    expect(config.resultCacheTtlMs).toBe(3600000);
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      GITHUB_TOKEN: ' test-token ',
      GEMINI_MODEL: 'gemini-2.0-flash',
      API_TOKENS: 'ci:test-secret, other-secret,,',
      RETRY_MAX_ATTEMPTS: '3',
      RETRY_JITTER: '0',
      RESULT_CACHE_TTL_MS: '0',
    });

    expect(config.port).toBe(8080);
    expect(config.githubToken).toBe('test-token');
    expect(config.geminiModel).toBe('gemini-2.0-flash');
    expect(config.apiTokens).toEqual(['ci:test-secret', 'other-secret']);
    expect(config.retry.maxAttempts).toBe(3);
    expect(config.retry.jitter).toBe(0);
    expect(config.resultCacheTtlMs).toBe(0);
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', GEMINI_API_KEY: '' })).toMatchObject({ port: 3000, geminiApiKey: undefined });
  });

  it('should reject invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be an integer >= 1, got "abc"');
    expect(() => loadConfig({ RETRY_MAX_ATTEMPTS: '0' })).toThrow('RETRY_MAX_ATTEMPTS must be an integer >= 1, got "0"');
    expect(() => loadConfig({ MAX_FILES: '10.5' })).toThrow('MAX_FILES must be an integer >= 1, got "10.5"');
    expect(() => loadConfig({ RETRY_JITTER: '2' })).toThrow('RETRY_JITTER must be a number between 0 and 1, got "2"');
  });
});
