import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_GATEWAY_BIND = 'lan';
export const DEFAULT_GATEWAY_PORT = 18789;
export const DEFAULT_TRUSTED_PROXIES =
  'loopback,linklocal,uniquelocal,10.0.0.0/8,172.16.0.0/12,192.168.0.0/16';
export const DEFAULT_BROWSER_URL = 'http://openclaw-browser:9222';
export const DEFAULT_STATE_DIR = '/data/.openclaw';
export const DEFAULT_WORKSPACE_DIR = '/data/openclaw';
export const DEFAULT_APP_DIR = '/app';
export const DEFAULT_ENTRY = 'dist/index.js';

export const DM_POLICIES = ['pairing', 'allowlist', 'open', 'disabled'] as const;
export type DmPolicy = (typeof DM_POLICIES)[number];

const FALSY_FLAGS = new Set(['false', '0', 'no', 'off']);

// Shell scripts test with `[ -n "$VAR" ]`, so an empty value means unset.
const optional = z.preprocess(
  (value) => (typeof value === 'string' && value.length > 0 ? value : undefined),
  z.string().optional()
);

export const withDefault = (fallback: string) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.length > 0 ? value : fallback),
    z.string()
  );

export const gatewayPort = z.preprocess(
  (value) => (typeof value === 'string' && value.length > 0 ? value : String(DEFAULT_GATEWAY_PORT)),
  z
    .string()
    .regex(/^\d+$/, 'must be an integer')
    .transform(Number)
    .pipe(z.number().int().min(1, 'must be between 1 and 65535').max(65535, 'must be between 1 and 65535'))
);

const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.length > 0 ? value : undefined),
    z
      .string()
      .optional()
      .transform((value) => (value === undefined ? fallback : !FALSY_FLAGS.has(value.trim().toLowerCase())))
  );

const dmPolicy = z.preprocess(
  (value) => (typeof value === 'string' && value.length > 0 ? value.toLowerCase() : 'pairing'),
  z.enum(DM_POLICIES)
);

export const runtimeEnvSchema = z.object({
  OPENCLAW_GATEWAY_TOKEN: optional,
  OPENCLAW_GATEWAY_BIND: withDefault(DEFAULT_GATEWAY_BIND),
  OPENCLAW_GATEWAY_PORT: gatewayPort,
  OPENCLAW_TRUSTED_PROXIES: optional,
  OPENCLAW_MODEL: optional,

  ANTHROPIC_API_KEY: optional,
  CLAUDE_CODE_OAUTH_TOKEN: optional,
  GEMINI_API_KEY: optional,
  OPENAI_API_KEY: optional,
  OPENROUTER_API_KEY: optional,

  TELEGRAM_BOT_TOKEN: optional,
  DISCORD_BOT_TOKEN: optional,
  SLACK_BOT_TOKEN: optional,
  SLACK_APP_TOKEN: optional,
  DISCORD_DM_POLICY: dmPolicy,
  SLACK_DM_POLICY: dmPolicy,

  OPENCLAW_BROWSER_ENABLED: flag(true),
  OPENCLAW_BROWSER_URL: withDefault(DEFAULT_BROWSER_URL),

  OPENCLAW_STATE_DIR: withDefault(DEFAULT_STATE_DIR),
  OPENCLAW_CONFIG_PATH: optional,
  OPENCLAW_WORKSPACE_DIR: withDefault(DEFAULT_WORKSPACE_DIR),
  OPENCLAW_APP_DIR: withDefault(DEFAULT_APP_DIR),
  OPENCLAW_ENTRY: withDefault(DEFAULT_ENTRY),
});

export type RuntimeEnv = z.infer<typeof runtimeEnvSchema>;

/** Filesystem locations derived from the runtime environment. */
export interface RuntimePaths {
  stateDir: string;
  configPath: string;
  authDir: string;
  authProfilesPath: string;
  workspaceDir: string;
  appDir: string;
  /** The two `.env` files the gateway looks in. */
  envFiles: [string, string];
}

/**
 * Parse the container environment. Structural errors (bad port, unknown DM
 * policy) throw with the variable name; missing credentials never do.
 */
export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const result = runtimeEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return result.data;
}

export function resolveRuntimePaths(env: RuntimeEnv): RuntimePaths {
  const stateDir = env.OPENCLAW_STATE_DIR;
  const authDir = path.join(stateDir, 'agents', 'main', 'agent');
  return {
    stateDir,
    configPath: env.OPENCLAW_CONFIG_PATH ?? path.join(stateDir, 'openclaw.json'),
    authDir,
    authProfilesPath: path.join(authDir, 'auth-profiles.json'),
    workspaceDir: env.OPENCLAW_WORKSPACE_DIR,
    appDir: env.OPENCLAW_APP_DIR,
    envFiles: [path.join(stateDir, '.env'), path.join(env.OPENCLAW_APP_DIR, '.env')],
  };
}
