import { describe, expect, it } from 'vitest';

import {
  DEFAULT_BROWSER_URL,
  DEFAULT_GATEWAY_PORT,
  loadRuntimeEnv,
  resolveRuntimePaths,
} from './env.js';

describe('loadRuntimeEnv', () => {
  it('applies defaults for an empty environment', () => {
    const env = loadRuntimeEnv({});

    expect(env.OPENCLAW_GATEWAY_BIND).toBe('lan');
    expect(env.OPENCLAW_GATEWAY_PORT).toBe(DEFAULT_GATEWAY_PORT);
    expect(env.OPENCLAW_BROWSER_ENABLED).toBe(true);
    expect(env.OPENCLAW_BROWSER_URL).toBe(DEFAULT_BROWSER_URL);
    expect(env.DISCORD_DM_POLICY).toBe('pairing');
    expect(env.SLACK_DM_POLICY).toBe('pairing');
    expect(env.OPENCLAW_GATEWAY_TOKEN).toBeUndefined();
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it('treats empty strings as unset', () => {
    const env = loadRuntimeEnv({
      OPENCLAW_GATEWAY_TOKEN: '',
      OPENCLAW_GATEWAY_BIND: '',
      OPENCLAW_GATEWAY_PORT: '',
      TELEGRAM_BOT_TOKEN: '',
    });

    expect(env.OPENCLAW_GATEWAY_TOKEN).toBeUndefined();
    expect(env.OPENCLAW_GATEWAY_BIND).toBe('lan');
    expect(env.OPENCLAW_GATEWAY_PORT).toBe(18789);
    expect(env.TELEGRAM_BOT_TOKEN).toBeUndefined();
  });

  it('parses the port as a number', () => {
    expect(loadRuntimeEnv({ OPENCLAW_GATEWAY_PORT: '3001' }).OPENCLAW_GATEWAY_PORT).toBe(3001);
  });

  it('fails fast on a non-numeric port', () => {
    expect(() => loadRuntimeEnv({ OPENCLAW_GATEWAY_PORT: 'eighty' })).toThrow(
      'Invalid environment: OPENCLAW_GATEWAY_PORT must be an integer'
    );
  });

  it('fails fast on an out-of-range port', () => {
    expect(() => loadRuntimeEnv({ OPENCLAW_GATEWAY_PORT: '70000' })).toThrow(
      'OPENCLAW_GATEWAY_PORT must be between 1 and 65535'
    );
  });

  it('rejects unknown DM policies', () => {
    expect(() => loadRuntimeEnv({ DISCORD_DM_POLICY: 'whenever' })).toThrow('DISCORD_DM_POLICY');
  });

  it('normalizes DM policy case', () => {
    expect(loadRuntimeEnv({ SLACK_DM_POLICY: 'Open' }).SLACK_DM_POLICY).toBe('open');
  });

  it.each([
    ['false', false],
    ['0', false],
    ['OFF', false],
    ['no', false],
    ['true', true],
    ['1', true],
  ])('reads OPENCLAW_BROWSER_ENABLED=%s as %s', (value, expected) => {
    expect(loadRuntimeEnv({ OPENCLAW_BROWSER_ENABLED: value }).OPENCLAW_BROWSER_ENABLED).toBe(expected);
  });
});

describe('resolveRuntimePaths', () => {
  it('derives the fixed container layout by default', () => {
    const paths = resolveRuntimePaths(loadRuntimeEnv({}));

    expect(paths).toEqual({
      stateDir: '/data/.openclaw',
      configPath: '/data/.openclaw/openclaw.json',
      authDir: '/data/.openclaw/agents/main/agent',
      authProfilesPath: '/data/.openclaw/agents/main/agent/auth-profiles.json',
      workspaceDir: '/data/openclaw',
      appDir: '/app',
      envFiles: ['/data/.openclaw/.env', '/app/.env'],
    });
  });

  it('honours an explicit config path and state dir', () => {
    const paths = resolveRuntimePaths(
      loadRuntimeEnv({
        OPENCLAW_STATE_DIR: '/tmp/state',
        OPENCLAW_CONFIG_PATH: '/tmp/custom/openclaw.json',
        OPENCLAW_APP_DIR: '/opt/openclaw',
      })
    );

    expect(paths.configPath).toBe('/tmp/custom/openclaw.json');
    expect(paths.authProfilesPath).toBe('/tmp/state/agents/main/agent/auth-profiles.json');
    expect(paths.envFiles).toEqual(['/tmp/state/.env', '/opt/openclaw/.env']);
  });
});
