import { Command } from 'commander';

import { launchGateway, type LaunchGatewayOptions } from '../../runtime/launcher.js';
import { loadRuntimeEnv } from '../../runtime/env.js';
import { runtimeSetup, type RuntimeSetupOptions, type RuntimeSetupResult } from '../../runtime/setup.js';
import { createLogger, type Logger } from '../../utils/logger.js';

type ExitFn = (code: number) => never;

export const DEFAULT_HEALTH_TIMEOUT_SECONDS = 10;

export interface EntrypointDependencies {
  env: () => NodeJS.ProcessEnv;
  createLogger: (component: string) => Logger;
  runtimeSetup: (options: RuntimeSetupOptions) => Promise<RuntimeSetupResult>;
  launchGateway: (options: LaunchGatewayOptions) => Promise<number>;
  fetch: (url: string, init: { signal: AbortSignal }) => Promise<Response>;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<EntrypointDependencies> = {}): EntrypointDependencies {
  return {
    env: () => process.env,
    createLogger: (component: string) => createLogger(component),
    runtimeSetup,
    launchGateway,
    fetch: (url, init) => fetch(url, init),
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid --timeout value: ${value}`);
  }
  return seconds;
}

export function healthUrl(port: number): string {
  return `http://127.0.0.1:${port}/health`;
}

export function registerEntrypointCommands(
  program: Command,
  overrides: Partial<EntrypointDependencies> = {}
): void {
  const deps = withDefaults(overrides);

  program
    .command('start')
    .description('Write gateway config and credentials from the environment, then run the gateway')
    .action(async () => {
      const env = deps.env();
      const logger = deps.createLogger('entrypoint');
      const setup = await deps.runtimeSetup({ env, logger });

      const status = await deps.launchGateway({
        env: setup.env,
        token: setup.token,
        logger: logger.child('gateway'),
        baseEnv: env,
      });
      deps.exit(status);
    });

  program
    .command('configure')
    .description('Write gateway config and credentials without starting the gateway')
    .action(async () => {
      const logger = deps.createLogger('entrypoint');
      const setup = await deps.runtimeSetup({ env: deps.env(), logger });

      deps.log(`Config:        ${setup.configPath}`);
      deps.log(`Model:         ${setup.model}`);
      deps.log(`Gateway token: ${setup.tokenSource}`);
      deps.log(`Channels:      ${setup.channels.join(', ')}`);
      deps.log(`Auth profiles: ${setup.authProfiles.length > 0 ? setup.authProfiles.join(', ') : 'none'}`);
    });

  program
    .command('health')
    .description('Probe the local gateway health endpoint (exit 0 when healthy)')
    .option('--timeout <seconds>', 'Request timeout in seconds', String(DEFAULT_HEALTH_TIMEOUT_SECONDS))
    .action(async (options: { timeout: string }) => {
      const timeoutMs = parseTimeoutSeconds(options.timeout) * 1000;
      const url = healthUrl(loadRuntimeEnv(deps.env()).OPENCLAW_GATEWAY_PORT);

      let healthy = false;
      try {
        const response = await deps.fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        if (response.ok) {
          healthy = true;
          deps.log(`Gateway healthy (HTTP ${response.status})`);
        } else {
          deps.error(`Gateway unhealthy: HTTP ${response.status} from ${url}`);
        }
      } catch (err) {
        deps.error(`Gateway unreachable at ${url}: ${err instanceof Error ? err.message : String(err)}`);
      }

      deps.exit(healthy ? 0 : 1);
    });
}
