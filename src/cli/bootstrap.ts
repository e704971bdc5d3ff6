import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';

import { configureFromEnv, createLogger } from '../utils/logger.js';
import { registerChannelLoginCommands } from './commands/channel-login.js';
import { registerEntrypointCommands } from './commands/entrypoint.js';
import { registerSetupCommands } from './commands/setup.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function findPackageJson(startDir: string): string {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }

  throw new Error('Could not find package.json');
}

function resolveCliVersion(): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(findPackageJson(__dirname), 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export const VERSION = resolveCliVersion();

// Host-side helpers read a local .env; inside the container the environment is authoritative.
const operatorCommands = new Set(['setup', 'channel-login']);

export function shouldLoadDotenv(argv: string[]): boolean {
  const commandName = argv[2];
  return commandName !== undefined && operatorCommands.has(commandName);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('openclaw-coolify')
    .description('Container entrypoint and host helpers for OpenClaw on Coolify')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerEntrypointCommands(program);
  registerSetupCommands(program);
  registerChannelLoginCommands(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  if (shouldLoadDotenv(argv)) {
    dotenvConfig({ quiet: true });
  }
  configureFromEnv(process.env);

  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    createLogger('cli').fatal(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
