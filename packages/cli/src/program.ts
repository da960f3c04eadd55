/**
 * ghscope command-line program
 *
 * @package @ghscope/cli
 */

import { Command } from 'commander';

import { callCommand } from './commands/call.js';
import { configCommand } from './commands/config.js';
import { resolveCommand } from './commands/resolve.js';
import { defaultGatewayFactory, serveCommand, type GatewayFactory } from './commands/serve.js';
import { toolsCommand } from './commands/tools.js';
import { CLI_VERSION } from './version.js';

export interface ProgramOptions {
  /** Gateway used by `serve` and `call` (default: GitHubClient) */
  createGateway?: GatewayFactory;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const createGateway = options.createGateway ?? defaultGatewayFactory;
  const program = new Command();

  program
    .name('ghscope')
    .description('Read-only GitHub tools for MCP clients, resolved from your working copy')
    .version(CLI_VERSION);

  serveCommand(program, createGateway);  // ghscope serve (default)
  resolveCommand(program);               // ghscope resolve
  toolsCommand(program);                 // ghscope tools
  callCommand(program, createGateway);   // ghscope call <tool>
  configCommand(program);                // ghscope config

  return program;
}
