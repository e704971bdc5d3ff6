import { z } from 'zod';

import { gatewayPort, withDefault } from '../../runtime/env.js';

export const DEFAULT_GATEWAY_CONTAINER = 'openclaw-gateway';
export const DEFAULT_REDIS_CONTAINER = 'openclaw-redis';
export const DEFAULT_BROWSER_CONTAINER = 'openclaw-browser';

export const operatorEnvSchema = z.object({
  OPENCLAW_CONTAINER: withDefault(DEFAULT_GATEWAY_CONTAINER),
  OPENCLAW_REDIS_CONTAINER: withDefault(DEFAULT_REDIS_CONTAINER),
  OPENCLAW_BROWSER_CONTAINER: withDefault(DEFAULT_BROWSER_CONTAINER),
  OPENCLAW_GATEWAY_PORT: gatewayPort,
});

export type OperatorEnv = z.infer<typeof operatorEnvSchema>;

/** Container names and gateway port as seen from the Docker host. */
export function loadOperatorEnv(env: NodeJS.ProcessEnv = process.env): OperatorEnv {
  const result = operatorEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return result.data;
}
