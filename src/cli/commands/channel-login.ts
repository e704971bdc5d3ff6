import { Command } from 'commander';

import { createDockerClient, type DockerOperations } from '../lib/docker.js';
import { color, formatHeader } from '../lib/formatting.js';
import { loadOperatorEnv } from '../lib/operator-env.js';

type ExitFn = (code: number) => never;

export type LoginChannel = 'whatsapp' | 'telegram' | 'discord' | 'slack' | 'status';

const CHANNEL_ALIASES = new Map<string, LoginChannel>([
  ['whatsapp', 'whatsapp'],
  ['wa', 'whatsapp'],
  ['telegram', 'telegram'],
  ['tg', 'telegram'],
  ['discord', 'discord'],
  ['slack', 'slack'],
  ['status', 'status'],
  ['all', 'status'],
]);

export const DISCORD_INVITE_URL =
  'https://discord.com/api/oauth2/authorize?client_id=YOUR_CLIENT_ID&permissions=277025508416&scope=bot';

export const CHANNEL_LOGIN_USAGE = [
  'Usage: openclaw-coolify channel-login [channel]',
  '',
  'Channels:',
  '  whatsapp, wa    - Login to WhatsApp (QR code)',
  '  telegram, tg    - Show Telegram setup instructions',
  '  discord         - Show Discord setup instructions',
  '  slack           - Show Slack setup instructions',
  '  status, all     - Show all channel status',
];

export interface ChannelLoginDependencies {
  env: () => NodeJS.ProcessEnv;
  docker: DockerOperations;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function withDefaults(overrides: Partial<ChannelLoginDependencies> = {}): ChannelLoginDependencies {
  return {
    env: () => process.env,
    docker: createDockerClient(),
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

export function resolveLoginChannel(value: string): LoginChannel | undefined {
  return CHANNEL_ALIASES.get(value.toLowerCase());
}

interface TokenInstructions {
  title: string;
  intro: string;
  steps: string[];
  extra?: string[];
  vars: string[];
}

const TOKEN_CHANNELS: Record<'telegram' | 'discord' | 'slack', TokenInstructions> = {
  telegram: {
    title: 'Telegram Configuration',
    intro: 'Telegram uses a bot token for authentication.',
    steps: [
      'Message @BotFather on Telegram',
      'Send /newbot and follow the prompts',
      'Copy the bot token',
      'Set TELEGRAM_BOT_TOKEN in your Coolify environment variables',
      'Redeploy your application',
    ],
    vars: ['TELEGRAM_BOT_TOKEN'],
  },
  discord: {
    title: 'Discord Configuration',
    intro: 'Discord uses a bot token for authentication.',
    steps: [
      'Go to https://discord.com/developers/applications',
      'Create a new application or select existing',
      'Go to Bot section and create/reset token',
      'Set DISCORD_BOT_TOKEN in your Coolify environment variables',
      'Redeploy your application',
    ],
    extra: ['Bot Invite URL format:', `  ${DISCORD_INVITE_URL}`, ''],
    vars: ['DISCORD_BOT_TOKEN'],
  },
  slack: {
    title: 'Slack Configuration',
    intro: 'Slack requires both a Bot Token and App Token.',
    steps: [
      'Go to https://api.slack.com/apps',
      'Create a new app or select existing',
      'Enable Socket Mode and get App Token (xapp-...)',
      'Install to workspace and get Bot Token (xoxb-...)',
      'Set SLACK_BOT_TOKEN and SLACK_APP_TOKEN in Coolify',
      'Redeploy your application',
    ],
    vars: ['SLACK_BOT_TOKEN', 'SLACK_APP_TOKEN'],
  },
};

export function registerChannelLoginCommands(
  program: Command,
  overrides: Partial<ChannelLoginDependencies> = {}
): void {
  const deps: ChannelLoginDependencies = withDefaults(overrides);
  const print = (lines: string[]) => {
    for (const line of lines) deps.log(line);
  };

  const showTokenInstructions = async (container: string, instructions: TokenInstructions) => {
    print(formatHeader(instructions.title));
    deps.log(instructions.intro);
    deps.log('');
    deps.log(`To configure ${instructions.title.replace(' Configuration', '')}:`);
    instructions.steps.forEach((step, index) => deps.log(`  ${index + 1}. ${step}`));
    deps.log('');
    print(instructions.extra ?? []);
    deps.log('Current status:');
    for (const name of instructions.vars) {
      if (await deps.docker.hasEnv(container, name)) {
        deps.log(color.green(`✓ ${name} is configured`));
      } else {
        deps.log(color.yellow(`✗ ${name} is not set`));
      }
    }
  };

  program
    .command('channel-login')
    .description('Log in to or show setup steps for a messaging channel (run on the Docker host)')
    .argument('[channel]', 'whatsapp, telegram, discord, slack or status', 'whatsapp')
    .action(async (channelArg: string) => {
      // An empty argument falls back to the default channel
      const channel = resolveLoginChannel(channelArg || 'whatsapp');
      if (!channel) {
        print(CHANNEL_LOGIN_USAGE);
        deps.exit(1);
      }

      const { OPENCLAW_CONTAINER: container } = loadOperatorEnv(deps.env());
      const running = await deps.docker.runningContainers();
      if (!running.includes(container)) {
        deps.error(color.yellow(`Error: ${container} is not running.`));
        deps.error('Please ensure OpenClaw is deployed and running.');
        deps.exit(1);
      }

      switch (channel) {
        case 'whatsapp': {
          print(formatHeader('WhatsApp Login'));
          print([
            'A QR code will appear below. Scan it with your WhatsApp app:',
            '  1. Open WhatsApp on your phone',
            '  2. Go to Settings → Linked Devices',
            "  3. Tap 'Link a Device'",
            '  4. Scan the QR code',
            '',
            'Press Ctrl+C to cancel.',
            '',
          ]);
          const code = await deps.docker.execOpenClaw(container, ['channels', 'login'], { interactive: true });
          if (code !== 0) {
            deps.error(color.red('WhatsApp login failed.'));
            deps.exit(1);
          }
          break;
        }
        case 'status': {
          print(formatHeader('Channel Status'));
          const code = await deps.docker.execOpenClaw(container, ['status']);
          if (code !== 0) {
            deps.error(color.red('Could not get channel status.'));
            deps.exit(1);
          }
          break;
        }
        default:
          await showTokenInstructions(container, TOKEN_CHANNELS[channel]);
      }

      deps.log('');
      deps.log(color.green('Done!'));
    });
}
