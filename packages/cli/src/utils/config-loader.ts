/**
 * Config loading for commands
 */

import { ConfigError, loadServerConfig, type ServerConfig } from '@ghscope/config';

import { displayConfigErrors } from './config-error-reporter.js';

/**
 * Load configuration, exiting with status 1 on invalid configuration
 *
 * @param configPath - Explicit config file (default: ghscope.config.yaml in cwd, if present)
 */
export async function loadConfigOrExit(configPath?: string): Promise<ServerConfig> {
  try {
    return await loadServerConfig({ configPath });
  } catch (error) {
    if (error instanceof ConfigError) {
      displayConfigErrors({ source: error.source, errors: error.errors });
      process.exit(1);
    }
    throw error;
  }
}
