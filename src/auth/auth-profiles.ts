import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { RuntimeEnv, RuntimePaths } from '../runtime/env.js';
import type { Logger } from '../utils/logger.js';
import { importSetupToken, type CommandRunner } from './setup-token.js';

export interface AuthProfile {
  provider: string;
  mode: 'api_key';
  apiKey: string;
}

export type AuthProfileSet = Record<string, AuthProfile>;

type ApiKeyVar = 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY' | 'OPENROUTER_API_KEY' | 'GEMINI_API_KEY';

interface ApiKeyProvider {
  envKey: ApiKeyVar;
  profileId: string;
  provider: string;
  label: string;
}

export const API_KEY_PROVIDERS: readonly ApiKeyProvider[] = [
  { envKey: 'ANTHROPIC_API_KEY', profileId: 'anthropic:api', provider: 'anthropic', label: 'Anthropic API key' },
  { envKey: 'OPENAI_API_KEY', profileId: 'openai:api', provider: 'openai', label: 'OpenAI API key' },
  { envKey: 'OPENROUTER_API_KEY', profileId: 'openrouter:api', provider: 'openrouter', label: 'OpenRouter API key' },
  { envKey: 'GEMINI_API_KEY', profileId: 'google:api', provider: 'google', label: 'Gemini API key' },
];

export const NO_CREDENTIALS_WARNING = [
  '==========================================',
  'WARNING: No API keys configured!',
  '==========================================',
  'Add one of these environment variables in Coolify:',
  "  - CLAUDE_CODE_OAUTH_TOKEN - for Claude Pro (run 'claude setup-token')",
  '  - ANTHROPIC_API_KEY - get from https://console.anthropic.com/settings/keys',
  '  - GEMINI_API_KEY - get from https://aistudio.google.com/apikey',
  '  - OPENAI_API_KEY - get from https://platform.openai.com/api-keys',
  '  - OPENROUTER_API_KEY - get from https://openrouter.ai/keys',
  '==========================================',
].join('\n');

const ENV_FILE_HEADER = '# Written by openclaw-coolify on container start; edits are overwritten';

const PLAIN_VALUE = /^[A-Za-z0-9_.:/+=@,-]*$/;

export interface CollectedCredentials {
  profiles: AuthProfileSet;
  envEntries: Array<[ApiKeyVar, string]>;
}

export function collectApiKeyProfiles(env: Pick<RuntimeEnv, ApiKeyVar>): CollectedCredentials {
  const profiles: AuthProfileSet = {};
  const envEntries: Array<[ApiKeyVar, string]> = [];

  for (const provider of API_KEY_PROVIDERS) {
    const apiKey = env[provider.envKey];
    if (!apiKey) continue;
    profiles[provider.profileId] = { provider: provider.provider, mode: 'api_key', apiKey };
    envEntries.push([provider.envKey, apiKey]);
  }

  return { profiles, envEntries };
}

/**
 * Render one `KEY=VALUE` line that dotenv reads back unchanged. Values that
 * need quoting get single quotes, or double quotes when they contain a single
 * quote or newline. Throws when no quoting round-trips.
 */
export function formatEnvLine(key: string, value: string): string {
  if (PLAIN_VALUE.test(value)) {
    return `${key}=${value}`;
  }
  if (!/['\r\n]/.test(value)) {
    return `${key}='${value}'`;
  }
  if (!/["\\\r]/.test(value)) {
    return `${key}="${value.replace(/\n/g, '\\n')}"`;
  }
  throw new Error(`${key} contains characters that cannot be written to a .env file`);
}

export function renderEnvFile(entries: Array<[string, string]>, logger: Logger): string {
  const lines = [ENV_FILE_HEADER];
  for (const [key, value] of entries) {
    try {
      lines.push(formatEnvLine(key, value));
    } catch (err) {
      logger.warn(`Skipping ${key} in .env files`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return lines.join('\n') + '\n';
}

async function writeFileWithDirs(filePath: string, content: string, mode?: number): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, { encoding: 'utf8', ...(mode === undefined ? {} : { mode }) });
}

export interface WriteAuthMaterialOptions {
  env: RuntimeEnv;
  paths: RuntimePaths;
  logger: Logger;
  /** Runs the setup-token import delegate. Defaults to spawning node. */
  runner?: CommandRunner;
  /** Writes banner lines unformatted. Defaults to stderr. */
  printLine?: (line: string) => void;
}

export interface AuthMaterialResult {
  /** Profile ids written to auth-profiles.json. */
  profiles: string[];
  /** null when no setup token was configured. */
  setupTokenImported: boolean | null;
  hasCredentials: boolean;
}

/**
 * Write `.env` files and auth-profiles.json from the environment, then import
 * a Claude setup token through the gateway CLI when one is set. Everything is
 * rebuilt from scratch so credentials removed from the environment disappear.
 */
export async function writeAuthMaterial(options: WriteAuthMaterialOptions): Promise<AuthMaterialResult> {
  const { env, paths, logger } = options;
  const { profiles, envEntries } = collectApiKeyProfiles(env);

  const envFile = renderEnvFile(envEntries, logger);
  for (const envPath of paths.envFiles) {
    await writeFileWithDirs(envPath, envFile, 0o600);
  }

  for (const provider of API_KEY_PROVIDERS) {
    if (profiles[provider.profileId]) {
      logger.info(`Added ${provider.label}`);
    }
  }

  await writeFileWithDirs(paths.authProfilesPath, JSON.stringify(profiles, null, 2) + '\n', 0o600);
  logger.info('Auth profiles written', { path: paths.authProfilesPath, count: envEntries.length });

  let setupTokenImported: boolean | null = null;
  if (env.CLAUDE_CODE_OAUTH_TOKEN) {
    setupTokenImported = await importSetupToken({
      token: env.CLAUDE_CODE_OAUTH_TOKEN,
      appDir: paths.appDir,
      entry: env.OPENCLAW_ENTRY,
      logger,
      runner: options.runner,
    });
  }

  const hasCredentials = envEntries.length > 0 || Boolean(env.CLAUDE_CODE_OAUTH_TOKEN);
  if (!hasCredentials) {
    // The banner goes out as-is; the log entry is for structured log readers.
    const printLine = options.printLine ?? ((line: string) => console.error(line));
    for (const line of NO_CREDENTIALS_WARNING.split('\n')) {
      printLine(line);
    }
    logger.warn('No API keys configured', {
      variables: ['CLAUDE_CODE_OAUTH_TOKEN', ...API_KEY_PROVIDERS.map((provider) => provider.envKey)],
    });
  }

  return { profiles: Object.keys(profiles), setupTokenImported, hasCredentials };
}
