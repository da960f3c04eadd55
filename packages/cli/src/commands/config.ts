/**
 * Config Command
 *
 * Show the effective configuration (defaults, config file, .env and
 * environment merged) with the token redacted.
 */

import { redactConfig } from '@ghscope/config';
import type { Command } from 'commander';

import { loadConfigOrExit } from '../utils/config-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface ConfigOptions {
  config?: string;
}

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Show the effective configuration (token redacted)')
    .option('-c, --config <path>', 'Configuration file (default: ./ghscope.config.yaml if present)')
    .action(async (options: ConfigOptions) => {
      const config = await loadConfigOrExit(options.config);
      await outputYamlResult(redactConfig(config));
    });
}
