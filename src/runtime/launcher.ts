import { spawn, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';

import type { Logger } from '../utils/logger.js';
import type { RuntimeEnv } from './env.js';

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP'];

/** Exit status used when the gateway binary cannot be started at all. */
export const EXIT_NOT_FOUND = 127;
export const EXIT_NOT_EXECUTABLE = 126;

export interface GatewayChild {
  pid?: number;
  kill(signal: NodeJS.Signals): boolean;
  once(event: 'error', listener: (err: Error) => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnGateway = (command: string, args: string[], options: SpawnOptions) => GatewayChild;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface LaunchGatewayOptions {
  env: Pick<RuntimeEnv, 'OPENCLAW_ENTRY' | 'OPENCLAW_GATEWAY_BIND' | 'OPENCLAW_GATEWAY_PORT' | 'OPENCLAW_APP_DIR'>;
  token: string;
  logger: Logger;
  /** Environment handed to the gateway; the resolved token is added to it. */
  baseEnv?: NodeJS.ProcessEnv;
  nodePath?: string;
  spawnImpl?: SpawnGateway;
  signals?: SignalSource;
  /**
   * Whether a terminal is attached. Ctrl+C on a terminal already reaches the
   * gateway through the shared process group, so SIGINT is not forwarded then.
   * Defaults to `process.stdin.isTTY`.
   */
  interactive?: boolean;
}

export function forwardedSignals(interactive: boolean): NodeJS.Signals[] {
  return FORWARDED_SIGNALS.filter((signal) => !(interactive && signal === 'SIGINT'));
}

export function buildGatewayArgs(
  env: Pick<RuntimeEnv, 'OPENCLAW_ENTRY' | 'OPENCLAW_GATEWAY_BIND' | 'OPENCLAW_GATEWAY_PORT'>
): string[] {
  return [
    env.OPENCLAW_ENTRY,
    'gateway',
    '--bind',
    env.OPENCLAW_GATEWAY_BIND,
    '--port',
    String(env.OPENCLAW_GATEWAY_PORT),
    '--allow-unconfigured',
  ];
}

export function exitStatusFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (constants.signals[signal] ?? 0);
  return 1;
}

function exitStatusForSpawnError(err: Error): number {
  return 'code' in err && err.code === 'EACCES' ? EXIT_NOT_EXECUTABLE : EXIT_NOT_FOUND;
}

/**
 * Run the gateway in the foreground and resolve with the status the container
 * should exit with. Termination signals sent to this process are passed on
 * to the gateway. There is no restart; the orchestrator owns that.
 */
export function launchGateway(options: LaunchGatewayOptions): Promise<number> {
  const spawnImpl: SpawnGateway = options.spawnImpl ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  const signals: SignalSource = options.signals ?? process;
  const command = options.nodePath ?? process.execPath;
  const args = buildGatewayArgs(options.env);
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);

  options.logger.info('Starting gateway', {
    command,
    args,
    cwd: options.env.OPENCLAW_APP_DIR,
  });

  const child = spawnImpl(command, args, {
    cwd: options.env.OPENCLAW_APP_DIR,
    stdio: 'inherit',
    env: { ...(options.baseEnv ?? process.env), OPENCLAW_GATEWAY_TOKEN: options.token },
  });

  return new Promise((resolve) => {
    const forwarders = new Map<NodeJS.Signals, () => void>();
    const forwarded = new Set(forwardedSignals(interactive));
    // Every signal gets a handler so Node's default exit never orphans the gateway.
    for (const signal of FORWARDED_SIGNALS) {
      const forward = () => {
        if (!forwarded.has(signal)) {
          options.logger.info(`Received ${signal}, waiting for gateway to exit`, { pid: child.pid });
          return;
        }
        options.logger.info(`Received ${signal}, forwarding to gateway`, { pid: child.pid });
        child.kill(signal);
      };
      forwarders.set(signal, forward);
      signals.on(signal, forward);
    }

    let settled = false;
    const finish = (status: number) => {
      if (settled) return;
      settled = true;
      for (const [signal, forward] of forwarders) {
        signals.off(signal, forward);
      }
      resolve(status);
    };

    child.once('error', (err) => {
      options.logger.error('Failed to start gateway', { command, error: err.message });
      finish(exitStatusForSpawnError(err));
    });

    child.once('exit', (code, signal) => {
      const status = exitStatusFor(code, signal);
      options.logger.info('Gateway exited', { code, signal, status });
      finish(status);
    });
  });
}
