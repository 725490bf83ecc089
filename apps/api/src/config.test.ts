import { describe, expect, it } from 'vitest';
import { loadConfig, validateConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      llmProvider: 'anthropic',
      llmModel: undefined,
      anthropicApiKey: undefined,
      openaiApiKey: undefined,
      contextWindow: 30,
      classifierContextTurns: 10,
      classifierMinConfidence: 0.5,
      classifierTimeoutMs: 15000,
      handlerTimeoutMs: 30000,
      keywordCollisionPolicy: 'first-wins',
      handlerOverridesPath: undefined,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      LLM_PROVIDER: ' OpenAI ',
      OPENAI_API_KEY: 'test-secret',
      CONTEXT_WINDOW: '12',
      CLASSIFIER_MIN_CONFIDENCE: '0.75',
      HANDLER_TIMEOUT_MS: '5000',
      KEYWORD_COLLISION_POLICY: 'reject',
      HANDLER_OVERRIDES_PATH: './overrides.json',
    });

    expect(config).toMatchObject({
      llmProvider: 'openai',
      openaiApiKey: 'test-secret',
      contextWindow: 12,
      classifierMinConfidence: 0.75,
      handlerTimeoutMs: 5000,
      keywordCollisionPolicy: 'reject',
      handlerOverridesPath: './overrides.json',
    });
  });
});

describe('validateConfig', () => {
  it('accepts defaults with a provider key', () => {
    const result = validateConfig(loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }));

    expect(result).toEqual({ ok: true, errors: [], warnings: [] });
  });

  it('warns when the selected provider has no key', () => {
    const result = validateConfig(loadConfig({ LLM_PROVIDER: 'openai', ANTHROPIC_API_KEY: 'test-secret' }));

    expect(result.ok).toBe(true);
    expect(result.warnings.map((w) => w.key)).toEqual(['OPENAI_API_KEY']);
  });

  it('rejects non-positive numbers and an out-of-range confidence', () => {
    const result = validateConfig(
      loadConfig({ ANTHROPIC_API_KEY: 'test-secret', HANDLER_TIMEOUT_MS: '0', CONTEXT_WINDOW: 'many', CLASSIFIER_MIN_CONFIDENCE: '1.5' })
    );

    expect(result.ok).toBe(false);
    expect(result.errors.map((e) => e.key)).toEqual(['CONTEXT_WINDOW', 'HANDLER_TIMEOUT_MS', 'CLASSIFIER_MIN_CONFIDENCE']);
  });
});
