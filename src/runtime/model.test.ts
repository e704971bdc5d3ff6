import { describe, expect, it } from 'vitest';

import { loadRuntimeEnv } from './env.js';
import { FALLBACK_MODEL, selectDefaultModel } from './model.js';

describe('selectDefaultModel', () => {
  it('falls back when no provider credential is set', () => {
    expect(selectDefaultModel({})).toBe(FALLBACK_MODEL);
    expect(FALLBACK_MODEL).toBe('anthropic/claude-sonnet-4-5');
  });

  it.each([
    ['ANTHROPIC_API_KEY', 'anthropic/claude-sonnet-4-5'],
    ['CLAUDE_CODE_OAUTH_TOKEN', 'anthropic/claude-sonnet-4-5'],
    ['GEMINI_API_KEY', 'google/gemini-3-pro-preview'],
    ['OPENAI_API_KEY', 'openai/gpt-4o'],
    ['OPENROUTER_API_KEY', 'openrouter/anthropic/claude-sonnet-4'],
  ])('maps %s to %s', (key, model) => {
    expect(selectDefaultModel(loadRuntimeEnv({ [key]: 'test-key' }))).toBe(model);
  });

  it('prefers Anthropic over every alternate', () => {
    expect(
      selectDefaultModel({
        OPENROUTER_API_KEY: 'test-key',
        OPENAI_API_KEY: 'test-key',
        GEMINI_API_KEY: 'test-key',
        ANTHROPIC_API_KEY: 'test-key',
      })
    ).toBe('anthropic/claude-sonnet-4-5');
  });

  it('prefers Gemini over OpenAI and OpenRouter', () => {
    expect(selectDefaultModel({ OPENAI_API_KEY: 'test-key', GEMINI_API_KEY: 'test-key' })).toBe(
      'google/gemini-3-pro-preview'
    );
  });

  it('prefers OpenAI over OpenRouter', () => {
    expect(selectDefaultModel({ OPENROUTER_API_KEY: 'test-key', OPENAI_API_KEY: 'test-key' })).toBe(
      'openai/gpt-4o'
    );
  });

  it('uses an explicit OPENCLAW_MODEL over derived choices', () => {
    expect(selectDefaultModel({ OPENCLAW_MODEL: 'openai/gpt-5', ANTHROPIC_API_KEY: 'test-key' })).toBe(
      'openai/gpt-5'
    );
  });
});
