import { Command } from 'commander';
import { describe, expect, it, vi } from 'vitest';

import { loadRuntimeEnv, resolveRuntimePaths } from '../../runtime/env.js';
import type { RuntimeSetupResult } from '../../runtime/setup.js';
import { createMemoryLogger } from '../../utils/logger.js';
import { registerEntrypointCommands, type EntrypointDependencies } from './entrypoint.js';

class ExitSignal extends Error {
  constructor(public readonly code: number) {
    super(`exit:${code}`);
  }
}

function setupResult(overrides: Partial<RuntimeSetupResult> = {}): RuntimeSetupResult {
  const env = loadRuntimeEnv({ OPENCLAW_GATEWAY_TOKEN: 'test-token' });
  const paths = resolveRuntimePaths(env);
  return {
    env,
    paths,
    configPath: paths.configPath,
    model: 'anthropic/claude-sonnet-4-5',
    token: 'test-token',
    tokenSource: 'env',
    channels: ['whatsapp'],
    authProfiles: ['anthropic:api'],
    ...overrides,
  };
}

function createHarness(overrides: Partial<EntrypointDependencies> = {}) {
  const { logger, entries } = createMemoryLogger('entrypoint');
  const exit = vi.fn((code: number): never => {
    throw new ExitSignal(code);
  });

  const deps: EntrypointDependencies = {
    env: vi.fn(() => ({ OPENCLAW_GATEWAY_PORT: '18789' })),
    createLogger: vi.fn(() => logger),
    runtimeSetup: vi.fn(async () => setupResult()),
    launchGateway: vi.fn(async () => 0),
    fetch: vi.fn(async () => new Response('ok', { status: 200 })),
    log: vi.fn(() => undefined),
    error: vi.fn(() => undefined),
    exit,
    ...overrides,
  };

  const program = new Command();
  program.exitOverride();
  registerEntrypointCommands(program, deps);

  return { program, deps, entries };
}

async function runCommand(program: Command, args: string[]): Promise<number | undefined> {
  try {
    await program.parseAsync(args, { from: 'user' });
    return undefined;
  } catch (err) {
    if (err instanceof ExitSignal) {
      return err.code;
    }
    throw err;
  }
}

describe('registerEntrypointCommands', () => {
  it('registers the container commands', () => {
    const { program } = createHarness();
    expect(program.commands.map((command) => command.name())).toEqual(['start', 'configure', 'health']);
  });

  it('start configures, launches the gateway and exits with its status', async () => {
    const env = { OPENCLAW_GATEWAY_TOKEN: 'test-token', PATH: '/usr/bin' };
    const { program, deps } = createHarness({
      env: vi.fn(() => env),
      launchGateway: vi.fn(async () => 143),
    });

    const exitCode = await runCommand(program, ['start']);

    expect(exitCode).toBe(143);
    expect(deps.runtimeSetup).toHaveBeenCalledWith(expect.objectContaining({ env }));
    expect(deps.launchGateway).toHaveBeenCalledWith(
      expect.objectContaining({ token: 'test-token', baseEnv: env })
    );
  });

  it('start does not launch when setup fails', async () => {
    const { program, deps } = createHarness({
      runtimeSetup: vi.fn(async () => {
        throw new Error('Invalid environment: OPENCLAW_GATEWAY_PORT must be an integer');
      }),
    });

    await expect(runCommand(program, ['start'])).rejects.toThrow('OPENCLAW_GATEWAY_PORT must be an integer');
    expect(deps.launchGateway).not.toHaveBeenCalled();
  });

  it('configure prints a summary without launching', async () => {
    const { program, deps } = createHarness({
      runtimeSetup: vi.fn(async () => setupResult({ channels: ['whatsapp', 'discord'], authProfiles: [] })),
    });

    const exitCode = await runCommand(program, ['configure']);

    expect(exitCode).toBeUndefined();
    expect(deps.launchGateway).not.toHaveBeenCalled();
    expect(deps.log).toHaveBeenCalledWith('Channels:      whatsapp, discord');
    expect(deps.log).toHaveBeenCalledWith('Auth profiles: none');
    expect(deps.log).toHaveBeenCalledWith('Gateway token: env');
  });

  it('health exits 0 on a 2xx response', async () => {
    const { program, deps } = createHarness({ env: vi.fn(() => ({ OPENCLAW_GATEWAY_PORT: '9000' })) });

    const exitCode = await runCommand(program, ['health']);

    expect(exitCode).toBe(0);
    expect(deps.fetch).toHaveBeenCalledWith('http://127.0.0.1:9000/health', {
      signal: expect.any(AbortSignal),
    });
    expect(deps.log).toHaveBeenCalledWith('Gateway healthy (HTTP 200)');
  });

  it('health exits 1 on a non-2xx response', async () => {
    const { program, deps } = createHarness({
      fetch: vi.fn(async () => new Response('starting', { status: 503 })),
    });

    const exitCode = await runCommand(program, ['health']);

    expect(exitCode).toBe(1);
    expect(deps.error).toHaveBeenCalledWith('Gateway unhealthy: HTTP 503 from http://127.0.0.1:18789/health');
  });

  it('health exits 1 when the gateway is unreachable', async () => {
    const { program, deps } = createHarness({
      fetch: vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    });

    const exitCode = await runCommand(program, ['health']);

    expect(exitCode).toBe(1);
    expect(deps.error).toHaveBeenCalledWith('Gateway unreachable at http://127.0.0.1:18789/health: fetch failed');
  });

  it('health rejects a bad timeout', async () => {
    const { program, deps } = createHarness();

    await expect(runCommand(program, ['health', '--timeout', 'soon'])).rejects.toThrow(
      'Invalid --timeout value: soon'
    );
    expect(deps.fetch).not.toHaveBeenCalled();
  });
});
