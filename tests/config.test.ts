import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { DEFAULT_MAX_DOCUMENT_BYTES, loadAppConfig } from '../src/config/appConfig';
import { ConfigurationError } from '../src/errors';
import { loadProviderConfig } from '../src/llm/config';

describe('loadProviderConfig', () => {
  it('defaults to the Gemini backend', () => {
    expect(loadProviderConfig({ GOOGLE_API_KEY: 'test-api-key' })).toEqual({
      backend: 'gemini',
      apiKey: 'test-api-key',
      timeoutMs: 60000,
      textModel: 'gemini-2.0-flash',
      multimodalModel: 'gemini-2.0-flash',
    });
  });

  it('reads sampling settings and model overrides', () => {
    const config = loadProviderConfig({
      LLM_BACKEND: 'gemini',
      GOOGLE_API_KEY: 'test-api-key',
      GEMINI_TEXT_MODEL: 'gemini-1.5-pro',
      LLM_TIMEOUT_MS: '15000',
      LLM_TEMPERATURE: '0.2',
      LLM_TOP_K: '',
    });

    expect(config).toMatchObject({ textModel: 'gemini-1.5-pro', timeoutMs: 15000, temperature: 0.2 });
    expect(config.topK).toBeUndefined();
  });

  it('reads the Ollama settings', () => {
    expect(
      loadProviderConfig({
        LLM_BACKEND: 'ollama',
        OLLAMA_BASE_URL: 'http://localhost:11434',
        OLLAMA_TEXT_MODEL: 'llama3.1',
        OLLAMA_MULTIMODAL_MODEL: 'llava',
      })
    ).toEqual({
      backend: 'ollama',
      baseUrl: 'http://localhost:11434',
      textModel: 'llama3.1',
      multimodalModel: 'llava',
      keepAlive: '5m',
      timeoutMs: 60000,
    });
  });

  it('names every missing Ollama setting', () => {
    let error: unknown;
    try {
      loadProviderConfig({ LLM_BACKEND: 'ollama' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.message).toContain('OLLAMA_BASE_URL is required');
    expect(error.message).toContain('OLLAMA_TEXT_MODEL is required');
    expect(error.message).toContain('OLLAMA_MULTIMODAL_MODEL is required');
  });

  it('rejects a missing Gemini key and unknown backends', () => {
    expect(() => loadProviderConfig({})).toThrow('GOOGLE_API_KEY is required');
    expect(() => loadProviderConfig({ LLM_BACKEND: 'openai', GOOGLE_API_KEY: 'test-api-key' })).toThrow(
      ConfigurationError
    );
  });

  it('rejects out-of-range sampling values', () => {
    expect(() =>
      loadProviderConfig({ GOOGLE_API_KEY: 'test-api-key', LLM_TEMPERATURE: '3' })
    ).toThrow(ConfigurationError);
  });
});

describe('loadAppConfig', () => {
  it('applies defaults', () => {
    expect(loadAppConfig({})).toEqual({
      promptsDir: path.resolve('prompts'),
      promptDuplicatePolicy: 'first-wins',
      host: '0.0.0.0',
      port: 3000,
      corsOrigin: '*',
      maxDocumentBytes: DEFAULT_MAX_DOCUMENT_BYTES,
    });
  });

  it('prefers PORT over API_PORT', () => {
    expect(loadAppConfig({ PORT: '8080', API_PORT: '9090' }).port).toBe(8080);
    expect(loadAppConfig({ API_PORT: '9090' }).port).toBe(9090);
  });

  it('rejects an unknown duplicate policy', () => {
    expect(() => loadAppConfig({ PROMPT_DUPLICATE_POLICY: 'random' })).toThrow(ConfigurationError);
  });
});
