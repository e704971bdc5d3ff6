import { spawn } from 'node:child_process';

import type { Logger } from '../utils/logger.js';

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

export interface RunCommandOptions {
  cwd: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunCommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'inherit', 'pipe'],
    });

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    // The child may exit before reading stdin (EPIPE); keep that in stderr.
    child.stdin?.on('error', (err) => {
      stderr += `stdin: ${err.message}\n`;
    });
    child.once('error', reject);
    child.once('close', (code, signal) => {
      resolve({ code, signal, stderr });
    });

    child.stdin?.end(options.input ?? '');
  });

export interface ImportSetupTokenOptions {
  token: string;
  appDir: string;
  /** Gateway entry relative to appDir, e.g. dist/index.js. */
  entry: string;
  logger: Logger;
  runner?: CommandRunner;
  nodePath?: string;
}

export function buildSetupTokenArgs(entry: string): string[] {
  return [entry, 'models', 'auth', 'paste-token', '--provider', 'anthropic'];
}

/**
 * Hand a Claude setup token to the gateway's own credential import, which
 * owns the on-disk shape of OAuth credentials. Failures are logged and
 * reported as `false`; they never stop startup.
 */
export async function importSetupToken(options: ImportSetupTokenOptions): Promise<boolean> {
  const runner = options.runner ?? runCommand;
  const args = buildSetupTokenArgs(options.entry);

  try {
    const result = await runner(options.nodePath ?? process.execPath, args, {
      cwd: options.appDir,
      input: `${options.token}\n`,
    });

    if (result.code === 0) {
      options.logger.info('Imported Anthropic setup token (Claude Code)');
      return true;
    }

    options.logger.warn('Setup token import failed, continuing without it', {
      code: result.code,
      signal: result.signal,
      stderr: result.stderr.trim(),
    });
    return false;
  } catch (err) {
    options.logger.warn('Setup token import could not run, continuing without it', {
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}
