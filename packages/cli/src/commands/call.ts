/**
 * Call Command
 *
 * Runs one tool by hand and prints its result, the same value an MCP client
 * would receive.
 */

import { findTool, runTool, TOOLS } from '@ghscope/github';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadConfigOrExit } from '../utils/config-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

import { defaultGatewayFactory, type GatewayFactory } from './serve.js';

interface CallOptions {
  args: string;
  config?: string;
}

/**
 * Parse the --args JSON object
 *
 * @throws Error if the text is not a JSON object
 */
export function parseToolArgs(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--args must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function callCommand(program: Command, createGateway: GatewayFactory = defaultGatewayFactory): void {
  program
    .command('call')
    .description('Run one tool and print its result (exit 1 when the result is an error)')
    .argument('<tool>', 'Tool name (see: ghscope tools)')
    .option('-a, --args <json>', 'Tool arguments as a JSON object', '{}')
    .option('-c, --config <path>', 'Configuration file (default: ./ghscope.config.yaml if present)')
    .action(async (toolName: string, options: CallOptions) => {
      const tool = findTool(toolName);
      if (!tool) {
        console.error(chalk.red(`❌ Unknown tool: ${toolName}`));
        console.error(chalk.gray(`   Available: ${TOOLS.map(t => t.name).join(', ')}`));
        process.exit(1);
      }

      let args: Record<string, unknown>;
      try {
        args = parseToolArgs(options.args);
      } catch (error) {
        console.error(chalk.red(`❌ Invalid --args: ${error instanceof Error ? error.message : String(error)}`));
        process.exit(1);
      }

      const config = await loadConfigOrExit(options.config);
      const outcome = await runTool(tool, args, { gateway: createGateway(config) });

      if (outcome.success) {
        await outputYamlResult(outcome.data);
        return;
      }
      await outputYamlResult(outcome.failure);
      process.exit(1);
    });
}
