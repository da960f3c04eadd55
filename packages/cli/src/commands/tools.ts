/**
 * Tools Command
 */

import { TOOLS } from '@ghscope/github';
import type { Command } from 'commander';

import { outputYamlResult } from '../utils/yaml-output.js';

export function toolsCommand(program: Command): void {
  program
    .command('tools')
    .description('List the tools the MCP server exposes')
    .action(async () => {
      await outputYamlResult({
        tools: TOOLS.map(tool => ({
          name: tool.name,
          description: tool.description,
          arguments: Object.keys(tool.inputShape),
        })),
      });
    });
}
