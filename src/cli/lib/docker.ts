import { spawn } from 'node:child_process';

/** Gateway entry inside the published image. */
export const CONTAINER_ENTRY = 'dist/index.js';

export interface DockerRunOptions {
  /** Attach the terminal (`-it` plus inherited stdin). */
  interactive: boolean;
  /** Drop stderr, like `2>/dev/null`. */
  quiet: boolean;
  /** Collect stdout instead of printing it. */
  capture: boolean;
}

export interface DockerRunResult {
  code: number | null;
  stdout: string;
}

export type DockerRunner = (args: string[], options: DockerRunOptions) => Promise<DockerRunResult>;

export interface DockerExecOptions {
  interactive?: boolean;
  quiet?: boolean;
}

export interface DockerOperations {
  isAccessible(): Promise<boolean>;
  runningContainers(): Promise<string[]>;
  exec(container: string, argv: string[], options?: DockerExecOptions): Promise<number | null>;
  hasEnv(container: string, name: string): Promise<boolean>;
  execOpenClaw(container: string, args: string[], options?: DockerExecOptions): Promise<number | null>;
}

export const runDocker: DockerRunner = (args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn('docker', args, {
      stdio: [
        options.interactive ? 'inherit' : 'ignore',
        options.capture ? 'pipe' : 'inherit',
        options.quiet ? 'ignore' : 'inherit',
      ],
    });

    let stdout = '';
    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.once('error', reject);
    child.once('close', (code) => {
      resolve({ code, stdout });
    });
  });

export function buildExecArgs(container: string, argv: string[], interactive: boolean): string[] {
  return ['exec', ...(interactive ? ['-it'] : []), container, ...argv];
}

/**
 * Docker CLI wrapper for the host-side helpers. Commands run through the
 * `docker` binary so they honour the operator's context and permissions.
 */
export function createDockerClient(run: DockerRunner = runDocker): DockerOperations {
  const exec = async (container: string, argv: string[], options: DockerExecOptions = {}) => {
    const interactive = options.interactive ?? false;
    const result = await run(buildExecArgs(container, argv, interactive), {
      interactive,
      quiet: options.quiet ?? false,
      capture: false,
    });
    return result.code;
  };

  return {
    async isAccessible() {
      try {
        const result = await run(['ps'], { interactive: false, quiet: true, capture: true });
        return result.code === 0;
      } catch {
        return false;
      }
    },

    async runningContainers() {
      const result = await run(['ps', '--format', '{{.Names}}'], {
        interactive: false,
        quiet: true,
        capture: true,
      });
      if (result.code !== 0) return [];
      return result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    },

    exec,

    async hasEnv(container, name) {
      const result = await run(buildExecArgs(container, ['printenv', name], false), {
        interactive: false,
        quiet: true,
        capture: true,
      });
      // printenv prints a bare newline for an empty value
      return result.code === 0 && /./.test(result.stdout);
    },

    async execOpenClaw(container, args, options = {}) {
      const code = await exec(container, ['node', CONTAINER_ENTRY, ...args], { ...options, quiet: true });
      if (code === 0) return code;
      return exec(container, ['openclaw', ...args], options);
    },
  };
}
