import { randomBytes } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { createLogger, type Logger } from '../utils/logger.js';

export type TokenSource = 'env' | 'config' | 'generated';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export interface ResolveGatewayTokenOptions {
  envToken?: string;
  /** Prior openclaw.json to recover the token from. */
  configPath: string;
  logger?: Logger;
  /** Byte source for new tokens. Defaults to crypto.randomBytes. */
  generate?: () => string;
}

const priorConfigSchema = z.object({
  gateway: z.object({
    auth: z.object({
      token: z.string().min(1),
    }),
  }),
});

export function generateGatewayToken(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Read `gateway.auth.token` from an existing config document.
 * Returns null when the file is missing, unreadable, or has no token.
 */
export async function readTokenFromConfig(configPath: string, logger?: Logger): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    logger?.warn('Could not read existing config', { path: configPath, error: String(err) });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    logger?.warn('Existing config is not valid JSON, ignoring it', { path: configPath });
    return null;
  }

  const result = priorConfigSchema.safeParse(parsed);
  return result.success ? result.data.gateway.auth.token : null;
}

/**
 * Token resolution order: explicit env token, token from the prior config
 * document, then a fresh 32-byte hex value.
 */
export async function resolveGatewayToken(options: ResolveGatewayTokenOptions): Promise<ResolvedToken> {
  const logger = options.logger ?? createLogger('gateway-token');

  if (options.envToken) {
    return { token: options.envToken, source: 'env' };
  }

  const existing = await readTokenFromConfig(options.configPath, logger);
  if (existing) {
    logger.info('Reusing gateway token from existing config', { path: options.configPath });
    return { token: existing, source: 'config' };
  }

  const token = (options.generate ?? generateGatewayToken)();
  logger.info(`Generated new gateway token: ${token}`);
  return { token, source: 'generated' };
}
