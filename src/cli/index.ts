#!/usr/bin/env node
/**
 * openclaw-coolify CLI
 *
 * Commands:
 *   openclaw-coolify start                 - Configure from env, then run the gateway (container entrypoint)
 *   openclaw-coolify configure             - Configure from env only
 *   openclaw-coolify health                - Probe the local gateway /health endpoint
 *   openclaw-coolify setup                 - Post-deploy checks on the Docker host
 *   openclaw-coolify channel-login [name]  - Channel login and setup instructions
 */

import { runCli } from './bootstrap.js';

await runCli();
