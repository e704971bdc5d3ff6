import readline from 'node:readline';
import { Command } from 'commander';

import { createDockerClient, type DockerOperations } from '../lib/docker.js';
import { color, formatFailure, formatHeader, formatSuccess, formatWarning } from '../lib/formatting.js';
import { loadOperatorEnv, type OperatorEnv } from '../lib/operator-env.js';

type ExitFn = (code: number) => never;

export interface SetupDependencies {
  env: () => NodeJS.ProcessEnv;
  docker: DockerOperations;
  prompt: (question: string) => Promise<string>;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

async function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answer = await new Promise<string>((resolve) => {
    rl.question(question, resolve);
  });
  rl.close();
  return answer;
}

function withDefaults(overrides: Partial<SetupDependencies> = {}): SetupDependencies {
  return {
    env: () => process.env,
    docker: createDockerClient(),
    prompt: promptLine,
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Post-deploy walkthrough run on the Docker host: container checks, gateway
 * health, doctor and status output, channel overview and WhatsApp linking.
 * Only Docker access is fatal; every other check reports and moves on.
 */
export async function runSetupWizard(deps: SetupDependencies): Promise<void> {
  const env = loadOperatorEnv(deps.env());
  const gateway = env.OPENCLAW_CONTAINER;
  const print = (lines: string[]) => {
    for (const line of lines) deps.log(line);
  };

  print(formatHeader('OpenClaw Coolify Setup'));

  if (!(await deps.docker.isAccessible())) {
    deps.error(formatFailure('Cannot access Docker. Please run with sudo or add your user to the docker group.'));
    deps.exit(1);
  }

  if (await checkContainers(deps, env, print)) {
    print(formatHeader('Checking Gateway Health'));
    const healthCode = await deps.docker.exec(
      gateway,
      ['curl', '-sf', `http://localhost:${env.OPENCLAW_GATEWAY_PORT}/health`],
      { quiet: true }
    );
    deps.log(
      healthCode === 0
        ? formatSuccess('Gateway is healthy')
        : formatWarning('Gateway health check failed. It may still be starting up.')
    );

    print(formatHeader('Running OpenClaw Doctor'));
    if ((await deps.docker.execOpenClaw(gateway, ['doctor'], { quiet: true })) !== 0) {
      deps.log(formatWarning('Could not run doctor command'));
    }

    print(formatHeader('OpenClaw Status'));
    if ((await deps.docker.execOpenClaw(gateway, ['status'], { quiet: true })) !== 0) {
      deps.log(formatWarning('Could not get status'));
    }

    await showChannels(deps, gateway, print);
    await configureWhatsApp(deps, gateway, print);
  }

  showNextSteps(gateway, print);
}

async function checkContainers(
  deps: SetupDependencies,
  env: OperatorEnv,
  print: (lines: string[]) => void
): Promise<boolean> {
  print(formatHeader('Checking Container Status'));

  const running = new Set(await deps.docker.runningContainers());
  const expected = [env.OPENCLAW_CONTAINER, env.OPENCLAW_REDIS_CONTAINER, env.OPENCLAW_BROWSER_CONTAINER];
  let allRunning = true;

  for (const container of expected) {
    if (running.has(container)) {
      deps.log(formatSuccess(`${container} is running`));
    } else {
      deps.log(formatFailure(`${container} is not running`));
      allRunning = false;
    }
  }

  if (!allRunning) {
    deps.log(formatWarning('Some containers are not running. Please check your deployment.'));
  }
  return allRunning;
}

async function showChannels(
  deps: SetupDependencies,
  gateway: string,
  print: (lines: string[]) => void
): Promise<void> {
  print(formatHeader('Configured Channels'));

  const tokenChannels: Array<[string, string]> = [
    ['Telegram', 'TELEGRAM_BOT_TOKEN'],
    ['Discord', 'DISCORD_BOT_TOKEN'],
    ['Slack', 'SLACK_BOT_TOKEN'],
  ];
  for (const [label, variable] of tokenChannels) {
    deps.log(
      (await deps.docker.hasEnv(gateway, variable))
        ? formatSuccess(`${label}: Configured`)
        : color.yellow(`${label}: Not configured`)
    );
  }

  deps.log(color.yellow('WhatsApp: Requires QR scan (run openclaw-coolify channel-login)'));
  deps.log(formatSuccess('WebChat: Available at your domain'));
}

async function configureWhatsApp(
  deps: SetupDependencies,
  gateway: string,
  print: (lines: string[]) => void
): Promise<void> {
  print(formatHeader('WhatsApp Configuration'));
  deps.log('WhatsApp requires scanning a QR code to link your account.');
  deps.log('');

  const answer = await deps.prompt('Do you want to configure WhatsApp now? (y/n): ');
  if (!isYes(answer)) {
    deps.log(color.yellow('Skipping WhatsApp configuration. You can run this later with:'));
    deps.log('  openclaw-coolify channel-login whatsapp');
    return;
  }

  print([
    '',
    'Starting WhatsApp login... Scan the QR code with your phone.',
    '(WhatsApp → Settings → Linked Devices → Link a Device)',
    '',
  ]);
  const code = await deps.docker.execOpenClaw(gateway, ['channels', 'login'], { interactive: true });
  if (code !== 0) {
    deps.log(formatWarning('WhatsApp login did not complete. Retry with: openclaw-coolify channel-login whatsapp'));
  }
}

function showNextSteps(gateway: string, print: (lines: string[]) => void): void {
  print(formatHeader('Next Steps'));
  print([
    '1. Access the Control UI at your configured domain',
    '   Enter your OPENCLAW_GATEWAY_TOKEN to authenticate',
    '',
    '2. Configure additional channels if needed:',
    '   - WhatsApp: openclaw-coolify channel-login',
    '   - Add tokens via Coolify environment variables',
    '',
    '3. Start chatting! Send a message via any configured channel.',
    '',
    'Useful commands:',
    `  docker exec ${gateway} openclaw status`,
    `  docker exec ${gateway} openclaw health`,
    `  docker exec ${gateway} openclaw doctor`,
    `  docker logs ${gateway}`,
    '',
    color.blue('Documentation: https://docs.openclaw.ai'),
  ]);
}

export function registerSetupCommands(program: Command, overrides: Partial<SetupDependencies> = {}): void {
  const deps = withDefaults(overrides);

  program
    .command('setup')
    .description('Check a deployed stack and walk through channel setup (run on the Docker host)')
    .action(async () => {
      await runSetupWizard(deps);
    });
}
