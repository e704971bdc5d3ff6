import { describe, expect, it } from 'vitest';

import { loadOperatorEnv } from './operator-env.js';

describe('loadOperatorEnv', () => {
  it('defaults to the compose service names', () => {
    expect(loadOperatorEnv({})).toEqual({
      OPENCLAW_CONTAINER: 'openclaw-gateway',
      OPENCLAW_REDIS_CONTAINER: 'openclaw-redis',
      OPENCLAW_BROWSER_CONTAINER: 'openclaw-browser',
      OPENCLAW_GATEWAY_PORT: 18789,
    });
  });

  it('accepts overrides', () => {
    const env = loadOperatorEnv({ OPENCLAW_CONTAINER: 'gateway-abc123', OPENCLAW_GATEWAY_PORT: '9000' });
    expect(env.OPENCLAW_CONTAINER).toBe('gateway-abc123');
    expect(env.OPENCLAW_GATEWAY_PORT).toBe(9000);
  });

  it('rejects a bad port', () => {
    expect(() => loadOperatorEnv({ OPENCLAW_GATEWAY_PORT: '70000' })).toThrow(
      'Invalid environment: OPENCLAW_GATEWAY_PORT must be between 1 and 65535'
    );
  });
});
