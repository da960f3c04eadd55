/**
 * Serve Command
 *
 * Runs the MCP server over stdio. stdout carries protocol frames only.
 */

import type { ServerConfig } from '@ghscope/config';
import { GitHubClient, TOOLS, type GitHubGateway } from '@ghscope/github';
import { logDebug } from '@ghscope/utils';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Command } from 'commander';

import { createServer } from '../server.js';
import { loadConfigOrExit } from '../utils/config-loader.js';

/**
 * Builds the gateway commands talk to; overridden in tests
 */
export type GatewayFactory = (config: ServerConfig) => GitHubGateway;

export const defaultGatewayFactory: GatewayFactory = config => new GitHubClient(config);

interface ServeOptions {
  config?: string;
}

export function serveCommand(program: Command, createGateway: GatewayFactory = defaultGatewayFactory): void {
  program
    .command('serve', { isDefault: true })
    .description('Run the MCP server over stdio (default command)')
    .option('-c, --config <path>', 'Configuration file (default: ./ghscope.config.yaml if present)')
    .action(async (options: ServeOptions) => {
      const config = await loadConfigOrExit(options.config);
      const server = createServer(config, createGateway(config));

      await server.connect(new StdioServerTransport());
      logDebug('server', 'MCP server listening on stdio', { tools: TOOLS.length });
    });
}
