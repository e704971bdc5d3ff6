import { mkdir } from 'node:fs/promises';

import { writeAuthMaterial } from '../auth/auth-profiles.js';
import type { CommandRunner } from '../auth/setup-token.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { loadRuntimeEnv, resolveRuntimePaths, type RuntimeEnv, type RuntimePaths } from './env.js';
import { resolveGatewayToken, type TokenSource } from './gateway-token.js';
import { selectDefaultModel } from './model.js';
import {
  buildOpenClawConfig,
  enabledChannels,
  writeOpenClawConfig,
  type ChannelName,
} from './openclaw-config.js';

export interface RuntimeSetupOptions {
  /** Raw environment. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Runs the setup-token import delegate. */
  runner?: CommandRunner;
  generateToken?: () => string;
  /** Receives the no-credentials banner line by line. */
  printLine?: (line: string) => void;
}

export interface RuntimeSetupResult {
  env: RuntimeEnv;
  paths: RuntimePaths;
  configPath: string;
  model: string;
  token: string;
  tokenSource: TokenSource;
  channels: ChannelName[];
  authProfiles: string[];
}

/**
 * Full container setup: gateway config from the environment, then auth
 * material. Config problems throw; credential problems are only logged.
 *
 * Call this before starting the gateway.
 */
export async function runtimeSetup(options: RuntimeSetupOptions = {}): Promise<RuntimeSetupResult> {
  const logger = options.logger ?? createLogger('runtime');
  const env = loadRuntimeEnv(options.env ?? process.env);
  const paths = resolveRuntimePaths(env);

  await mkdir(paths.stateDir, { recursive: true });
  await mkdir(paths.workspaceDir, { recursive: true });

  // 1. Gateway token (env, prior config, or new)
  const { token, source } = await resolveGatewayToken({
    envToken: env.OPENCLAW_GATEWAY_TOKEN,
    configPath: paths.configPath,
    logger: logger.child('token'),
    generate: options.generateToken,
  });

  // 2. openclaw.json
  const model = selectDefaultModel(env);
  const config = buildOpenClawConfig({ env, model, token });
  await writeOpenClawConfig(paths.configPath, config);

  const channels = enabledChannels(config.channels);
  for (const channel of channels) {
    logger.info(`Channel enabled: ${channel}`);
  }
  logger.info('Config written', { path: paths.configPath, model });

  // 3. .env files, auth profiles, setup token
  const auth = await writeAuthMaterial({
    env,
    paths,
    logger: logger.child('auth'),
    runner: options.runner,
    printLine: options.printLine,
  });

  return {
    env,
    paths,
    configPath: paths.configPath,
    model,
    token,
    tokenSource: source,
    channels,
    authProfiles: auth.profiles,
  };
}
