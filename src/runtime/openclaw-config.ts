import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import { DEFAULT_TRUSTED_PROXIES, DM_POLICIES, type RuntimeEnv } from './env.js';

const mentionGroupsSchema = z.object({
  '*': z.object({ requireMention: z.boolean() }),
});

const dmSchema = z.object({ policy: z.enum(DM_POLICIES) });

export const channelsSchema = z.object({
  whatsapp: z.object({
    enabled: z.literal(true),
    allowFrom: z.array(z.string()),
    groups: mentionGroupsSchema,
  }),
  telegram: z
    .object({
      enabled: z.literal(true),
      botToken: z.string().min(1),
      groups: mentionGroupsSchema,
    })
    .optional(),
  discord: z
    .object({
      enabled: z.literal(true),
      token: z.string().min(1),
      dm: dmSchema,
    })
    .optional(),
  slack: z
    .object({
      enabled: z.literal(true),
      botToken: z.string().min(1),
      appToken: z.string().min(1),
      dm: dmSchema,
    })
    .optional(),
});

export const openClawConfigSchema = z.object({
  agent: z.object({
    model: z.string().min(1),
    workspace: z.string().min(1),
  }),
  gateway: z.object({
    bind: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    auth: z.object({
      mode: z.literal('token'),
      token: z.string().min(1),
    }),
    trustedProxies: z.array(z.string().min(1)),
    controlUi: z.object({ allowInsecureAuth: z.boolean() }),
  }),
  channels: channelsSchema,
  browser: z.object({
    enabled: z.boolean(),
    controlUrl: z.string().min(1),
  }),
  agents: z.object({
    defaults: z.object({ workspace: z.string().min(1) }),
  }),
});

export type OpenClawConfig = z.infer<typeof openClawConfigSchema>;
export type ChannelsConfig = z.infer<typeof channelsSchema>;
export type ChannelName = keyof ChannelsConfig;

type ChannelEnv = Pick<
  RuntimeEnv,
  | 'TELEGRAM_BOT_TOKEN'
  | 'DISCORD_BOT_TOKEN'
  | 'SLACK_BOT_TOKEN'
  | 'SLACK_APP_TOKEN'
  | 'DISCORD_DM_POLICY'
  | 'SLACK_DM_POLICY'
>;

export interface BuildOpenClawConfigInput {
  env: RuntimeEnv;
  model: string;
  token: string;
}

/** `"a, b,,c"` → `["a", "b", "c"]`; unset → the private-network defaults. */
export function parseTrustedProxies(value: string | undefined): string[] {
  return (value ?? DEFAULT_TRUSTED_PROXIES)
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * WhatsApp is always present; the others appear only when their credentials
 * do. Slack needs both the bot and app token.
 */
export function buildChannels(env: ChannelEnv): ChannelsConfig {
  const channels: ChannelsConfig = {
    whatsapp: {
      enabled: true,
      allowFrom: [],
      groups: { '*': { requireMention: true } },
    },
  };

  if (env.TELEGRAM_BOT_TOKEN) {
    channels.telegram = {
      enabled: true,
      botToken: env.TELEGRAM_BOT_TOKEN,
      groups: { '*': { requireMention: true } },
    };
  }

  if (env.DISCORD_BOT_TOKEN) {
    channels.discord = {
      enabled: true,
      token: env.DISCORD_BOT_TOKEN,
      dm: { policy: env.DISCORD_DM_POLICY },
    };
  }

  if (env.SLACK_BOT_TOKEN && env.SLACK_APP_TOKEN) {
    channels.slack = {
      enabled: true,
      botToken: env.SLACK_BOT_TOKEN,
      appToken: env.SLACK_APP_TOKEN,
      dm: { policy: env.SLACK_DM_POLICY },
    };
  }

  return channels;
}

export function enabledChannels(channels: ChannelsConfig): ChannelName[] {
  const order: ChannelName[] = ['whatsapp', 'telegram', 'discord', 'slack'];
  return order.filter((name) => channels[name] !== undefined);
}

export function buildOpenClawConfig(input: BuildOpenClawConfigInput): OpenClawConfig {
  const { env, model, token } = input;
  const workspace = env.OPENCLAW_WORKSPACE_DIR;

  return {
    agent: { model, workspace },
    gateway: {
      bind: env.OPENCLAW_GATEWAY_BIND,
      port: env.OPENCLAW_GATEWAY_PORT,
      auth: { mode: 'token', token },
      trustedProxies: parseTrustedProxies(env.OPENCLAW_TRUSTED_PROXIES),
      controlUi: { allowInsecureAuth: true },
    },
    channels: buildChannels(env),
    browser: {
      enabled: env.OPENCLAW_BROWSER_ENABLED,
      controlUrl: env.OPENCLAW_BROWSER_URL,
    },
    agents: {
      defaults: { workspace },
    },
  };
}

/**
 * Validate and write the config document, replacing whatever was there.
 */
export async function writeOpenClawConfig(configPath: string, config: OpenClawConfig): Promise<void> {
  const validated = openClawConfigSchema.parse(config);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(validated, null, 2) + '\n', 'utf8');
}
