import type { RuntimeEnv } from './env.js';

export const FALLBACK_MODEL = 'anthropic/claude-sonnet-4-5';

type CredentialKey =
  | 'ANTHROPIC_API_KEY'
  | 'CLAUDE_CODE_OAUTH_TOKEN'
  | 'GEMINI_API_KEY'
  | 'OPENAI_API_KEY'
  | 'OPENROUTER_API_KEY';

interface ProviderModel {
  credentials: CredentialKey[];
  model: string;
}

/** First provider with a credential decides the default model. */
export const PROVIDER_MODEL_PRIORITY: readonly ProviderModel[] = [
  { credentials: ['ANTHROPIC_API_KEY', 'CLAUDE_CODE_OAUTH_TOKEN'], model: 'anthropic/claude-sonnet-4-5' },
  { credentials: ['GEMINI_API_KEY'], model: 'google/gemini-3-pro-preview' },
  { credentials: ['OPENAI_API_KEY'], model: 'openai/gpt-4o' },
  { credentials: ['OPENROUTER_API_KEY'], model: 'openrouter/anthropic/claude-sonnet-4' },
];

export function selectDefaultModel(env: Pick<RuntimeEnv, CredentialKey | 'OPENCLAW_MODEL'>): string {
  if (env.OPENCLAW_MODEL) {
    return env.OPENCLAW_MODEL;
  }
  const match = PROVIDER_MODEL_PRIORITY.find((entry) => entry.credentials.some((key) => Boolean(env[key])));
  return match?.model ?? FALLBACK_MODEL;
}
