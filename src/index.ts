/**
 * openclaw-coolify
 * Configure and launch the OpenClaw gateway from container environment variables.
 */

export {
  loadRuntimeEnv,
  resolveRuntimePaths,
  runtimeEnvSchema,
  DM_POLICIES,
  type DmPolicy,
  type RuntimeEnv,
  type RuntimePaths,
} from './runtime/env.js';
export { selectDefaultModel, FALLBACK_MODEL, PROVIDER_MODEL_PRIORITY } from './runtime/model.js';
export {
  generateGatewayToken,
  readTokenFromConfig,
  resolveGatewayToken,
  type ResolvedToken,
  type TokenSource,
} from './runtime/gateway-token.js';
export {
  buildChannels,
  buildOpenClawConfig,
  enabledChannels,
  openClawConfigSchema,
  parseTrustedProxies,
  writeOpenClawConfig,
  type ChannelName,
  type ChannelsConfig,
  type OpenClawConfig,
} from './runtime/openclaw-config.js';
export { buildGatewayArgs, launchGateway, type LaunchGatewayOptions } from './runtime/launcher.js';
export { runtimeSetup, type RuntimeSetupOptions, type RuntimeSetupResult } from './runtime/setup.js';

export {
  collectApiKeyProfiles,
  formatEnvLine,
  writeAuthMaterial,
  NO_CREDENTIALS_WARNING,
  type AuthProfile,
  type AuthMaterialResult,
} from './auth/auth-profiles.js';
export { importSetupToken, runCommand, type CommandRunner, type CommandResult } from './auth/setup-token.js';

export { createLogger, configure as configureLogger, type Logger, type LogLevel } from './utils/logger.js';
